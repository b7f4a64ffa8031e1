import { DEFAULT_PAGE_SIZE } from '../common/pagination/pagination';
import { BlogClientError } from './client-error';
import { GrpcTransport, type GrpcTransportOptions } from './grpc-transport';
import { HttpTransport, type HttpTransportOptions } from './http-transport';
import type { AuthResponse, ListPostsResponse, Post, PostFields } from './models';
import type { TokenStore } from './token-store';
import type { BlogTransport } from './transport';

/**
 * Typed client over either transport. Remembers the token from register/login
 * and sends it on protected calls; with a TokenStore the token also survives restarts.
 */
export class BlogClient {
  private token: string | null = null;

  constructor(
    private readonly transport: BlogTransport,
    private readonly store?: TokenStore,
  ) {}

  static http(baseUrl: string, store?: TokenStore, options?: HttpTransportOptions) {
    return new BlogClient(new HttpTransport(baseUrl, options), store);
  }

  static grpc(address: string, store?: TokenStore, options?: GrpcTransportOptions) {
    return new BlogClient(new GrpcTransport(address, options), store);
  }

  /** Loads a previously saved token. Resolves true when one was found. */
  async restoreToken(): Promise<boolean> {
    if (!this.store) return false;
    this.token = await this.store.load();
    return this.token !== null;
  }

  getToken(): string | null {
    return this.token;
  }

  async setToken(token: string): Promise<void> {
    this.token = token;
    await this.store?.save(token);
  }

  async clearToken(): Promise<void> {
    this.token = null;
    await this.store?.clear();
  }

  async register(username: string, email: string, password: string): Promise<AuthResponse> {
    const res = await this.transport.register(username, email, password);
    await this.setToken(res.accessToken);
    return res;
  }

  async login(username: string, password: string): Promise<AuthResponse> {
    const res = await this.transport.login(username, password);
    await this.setToken(res.accessToken);
    return res;
  }

  async createPost(fields: PostFields): Promise<Post> {
    return this.transport.createPost(this.requireToken(), fields);
  }

  async getPost(id: number): Promise<Post> {
    return this.transport.getPost(id);
  }

  async updatePost(id: number, fields: PostFields): Promise<Post> {
    return this.transport.updatePost(this.requireToken(), id, fields);
  }

  async deletePost(id: number): Promise<void> {
    return this.transport.deletePost(this.requireToken(), id);
  }

  async listPosts(limit = DEFAULT_PAGE_SIZE, offset = 0): Promise<ListPostsResponse> {
    return this.transport.listPosts(limit, offset);
  }

  close() {
    this.transport.close?.();
  }

  private requireToken(): string {
    if (!this.token) throw BlogClientError.unauthorized('not logged in: register or login first');
    return this.token;
  }
}
