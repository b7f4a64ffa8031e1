import { Injectable, Logger, type LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type NodeEnv = 'development' | 'test' | 'production';

export type GrpcListenerConfig = {
  url: string;
  concurrencyLimit: number;
  requestTimeoutMs: number;
  maxReceiveMessageLength: number;
  maxSendMessageLength: number;
};

export type HttpListenerConfig = {
  port: number;
  bodyLimitBytes: number;
  concurrencyLimit: number;
  requestTimeoutMs: number;
};

const LOG_LEVELS: Record<string, LogLevel[]> = {
  error: ['error', 'fatal'],
  warn: ['error', 'fatal', 'warn'],
  info: ['error', 'fatal', 'warn', 'log'],
  debug: ['error', 'fatal', 'warn', 'log', 'debug'],
  verbose: ['error', 'fatal', 'warn', 'log', 'debug', 'verbose'],
};

@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);

  constructor(private readonly config: ConfigService) {}

  private readBool(key: string, fallback: boolean): boolean {
    const raw = this.config.get<string>(key);
    if (raw == null) return fallback;
    const v = String(raw).trim().toLowerCase();
    if (!v) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    return fallback;
  }

  private readPositiveInt(key: string, fallback: number): number {
    const raw = this.config.get<string>(key) ?? '';
    const n = Number(raw.trim());
    return raw.trim() && Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
  }

  nodeEnv(): NodeEnv {
    const raw = this.config.get<string>('NODE_ENV') ?? 'development';
    return raw === 'production' || raw === 'test' ? raw : 'development';
  }

  isProd(): boolean {
    return this.nodeEnv() === 'production';
  }

  databaseUrl(): string {
    return (this.config.get<string>('DATABASE_URL') ?? '').trim();
  }

  databasePoolMax(): number {
    return this.readPositiveInt('DATABASE_POOL_MAX', 10);
  }

  /** Number of connection attempts on startup (default 20). */
  databaseConnectRetries(): number {
    return this.readPositiveInt('DATABASE_CONNECT_RETRIES', 20);
  }

  /** Delay in ms between connection attempts (default 500). */
  databaseConnectRetryDelayMs(): number {
    return this.readPositiveInt('DATABASE_CONNECT_RETRY_DELAY_MS', 500);
  }

  jwtSecret(): string {
    // Presence and length are enforced by the env schema.
    return (this.config.get<string>('JWT_SECRET') ?? '').trim();
  }

  /** Token lifetime in seconds; non-positive values are handled by TokenService. */
  jwtTtlSeconds(): number {
    const raw = this.config.get<string>('JWT_TTL_SECONDS') ?? '3600';
    const n = Number(raw);
    return Number.isFinite(n) ? Math.trunc(n) : 3600;
  }

  http(): HttpListenerConfig {
    return {
      port: this.readPositiveInt('HTTP_PORT', 8080),
      bodyLimitBytes: this.readPositiveInt('HTTP_REQUEST_BODY_LIMIT_BYTES', 1024 * 1024),
      concurrencyLimit: this.readPositiveInt('HTTP_CONCURRENCY_LIMIT', 256),
      requestTimeoutMs: this.readPositiveInt('HTTP_REQUEST_TIMEOUT_SECS', 10) * 1000,
    };
  }

  grpc(): GrpcListenerConfig {
    return {
      url: (this.config.get<string>('GRPC_URL') ?? '').trim() || '0.0.0.0:50051',
      concurrencyLimit: this.readPositiveInt('GRPC_CONCURRENCY_LIMIT', 256),
      requestTimeoutMs: this.readPositiveInt('GRPC_REQUEST_TIMEOUT_SECS', 10) * 1000,
      maxReceiveMessageLength: this.readPositiveInt('GRPC_MAX_DECODING_MESSAGE_SIZE_BYTES', 4 * 1024 * 1024),
      maxSendMessageLength: this.readPositiveInt('GRPC_MAX_ENCODING_MESSAGE_SIZE_BYTES', 4 * 1024 * 1024),
    };
  }

  allowedOrigins(): string[] {
    const raw = this.config.get<string>('ALLOWED_ORIGINS') ?? '';
    return raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }

  isOriginAllowed(origin: string): boolean {
    return this.allowedOrigins().includes(origin);
  }

  logCorsBlocked(origin: string) {
    this.logger.warn(
      `CORS blocked origin: ${origin}. Allowed origins: ${this.allowedOrigins().join(', ') || '(none)'}`,
    );
  }

  logLevels(): LogLevel[] {
    const raw = (this.config.get<string>('LOG_LEVEL') ?? '').trim().toLowerCase();
    return LOG_LEVELS[raw] ?? (this.isProd() ? LOG_LEVELS.info : LOG_LEVELS.debug);
  }

  logRequests(): boolean {
    return this.readBool('LOG_REQUESTS', false);
  }
}
