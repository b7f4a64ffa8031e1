import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { BlogClientError } from './client-error';
import {
  authJsonSchema,
  listPostsJsonSchema,
  postJsonSchema,
  type AuthResponse,
  type ListPostsResponse,
  type Post,
  type PostFields,
} from './models';
import type { BlogTransport } from './transport';

const errorEnvelopeSchema = z.object({
  meta: z.object({
    errors: z.array(z.object({ message: z.string() })).min(1),
  }),
});

function dataEnvelope<T extends z.ZodTypeAny>(schema: T) {
  return z.object({ data: schema });
}

export type HttpTransportOptions = {
  timeoutMs?: number;
  /** Extra axios settings (an `adapter` in tests). */
  axios?: AxiosRequestConfig;
};

/** REST transport. `baseUrl` is the server root, e.g. `http://127.0.0.1:8080`. */
export class HttpTransport implements BlogTransport {
  private readonly http: AxiosInstance;

  constructor(baseUrl: string, options: HttpTransportOptions = {}) {
    this.http = axios.create({
      baseURL: `${baseUrl.replace(/\/+$/, '')}/api`,
      timeout: options.timeoutMs ?? 10_000,
      // Status handling happens in request() so every failure maps to a BlogClientError.
      validateStatus: () => true,
      ...options.axios,
    });
  }

  async register(username: string, email: string, password: string): Promise<AuthResponse> {
    const res = await this.request({ method: 'POST', url: '/auth/register', data: { username, email, password } });
    return this.parse(res, dataEnvelope(authJsonSchema)).data;
  }

  async login(username: string, password: string): Promise<AuthResponse> {
    const res = await this.request({ method: 'POST', url: '/auth/login', data: { username, password } });
    return this.parse(res, dataEnvelope(authJsonSchema)).data;
  }

  async createPost(token: string, fields: PostFields): Promise<Post> {
    const res = await this.request({ method: 'POST', url: '/posts', data: fields }, token);
    return this.parse(res, dataEnvelope(postJsonSchema)).data;
  }

  async getPost(id: number): Promise<Post> {
    const res = await this.request({ method: 'GET', url: `/posts/${id}` });
    return this.parse(res, dataEnvelope(postJsonSchema)).data;
  }

  async updatePost(token: string, id: number, fields: PostFields): Promise<Post> {
    const res = await this.request({ method: 'PUT', url: `/posts/${id}`, data: fields }, token);
    return this.parse(res, dataEnvelope(postJsonSchema)).data;
  }

  async deletePost(token: string, id: number): Promise<void> {
    await this.request({ method: 'DELETE', url: `/posts/${id}` }, token);
  }

  async listPosts(limit: number, offset: number): Promise<ListPostsResponse> {
    const res = await this.request({ method: 'GET', url: '/posts', params: { limit, offset } });
    return this.parse(res, dataEnvelope(listPostsJsonSchema)).data;
  }

  private async request(config: AxiosRequestConfig, token?: string): Promise<AxiosResponse<unknown>> {
    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.request<unknown>({
        ...config,
        headers: token ? { Authorization: `Bearer ${token}` } : undefined,
      });
    } catch (err) {
      throw new BlogClientError('transport', `http error: ${err instanceof Error ? err.message : String(err)}`, undefined, {
        cause: err,
      });
    }
    if (res.status >= 200 && res.status < 300) return res;

    const envelope = errorEnvelopeSchema.safeParse(res.data);
    const message = envelope.success ? envelope.data.meta.errors.map((e) => e.message).join('; ') : undefined;
    throw BlogClientError.fromHttpStatus(res.status, message);
  }

  private parse<T extends z.ZodTypeAny>(res: AxiosResponse<unknown>, schema: T): z.output<T> {
    const parsed = schema.safeParse(res.data);
    if (!parsed.success) {
      throw new BlogClientError('transport', `unexpected response body: ${parsed.error.issues[0]?.message ?? 'invalid'}`, res.status);
    }
    return parsed.data;
  }
}
