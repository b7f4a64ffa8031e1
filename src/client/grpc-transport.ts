import {
  credentials,
  loadPackageDefinition,
  Metadata,
  type Client,
  type GrpcObject,
  type ServiceClientConstructor,
  type ServiceDefinition,
} from '@grpc/grpc-js';
import { loadSync } from '@grpc/proto-loader';
import {
  BLOG_PROTO_LOADER_OPTIONS,
  BLOG_PROTO_PACKAGE,
  BLOG_PROTO_PATH,
  BLOG_SERVICE_NAME,
} from '../common/grpc/blog-proto';
import { toLimitOffset, toPage } from '../common/pagination/pagination';
import { BlogClientError } from './client-error';
import {
  authMessageSchema,
  listPostsMessageSchema,
  postMessageSchema,
  type AuthResponse,
  type ListPostsResponse,
  type Post,
  type PostFields,
} from './models';
import type { BlogTransport } from './transport';

type MethodName = 'Register' | 'Login' | 'CreatePost' | 'GetPost' | 'UpdatePost' | 'DeletePost' | 'ListPosts';

/** Resolves `quill.v1.BlogService` in the loaded package definition. */
export function loadBlogServiceConstructor(protoPath = BLOG_PROTO_PATH): ServiceClientConstructor {
  let node: GrpcObject = loadPackageDefinition(loadSync(protoPath, BLOG_PROTO_LOADER_OPTIONS));
  for (const segment of BLOG_PROTO_PACKAGE.split('.')) {
    const next = node[segment];
    if (!next || typeof next === 'function' || 'format' in next) {
      throw new Error(`package ${BLOG_PROTO_PACKAGE} not found in ${protoPath}`);
    }
    node = next;
  }
  const ctor = node[BLOG_SERVICE_NAME];
  if (typeof ctor !== 'function') {
    throw new Error(`${BLOG_PROTO_PACKAGE}.${BLOG_SERVICE_NAME} not found in ${protoPath}`);
  }
  return ctor;
}

export type GrpcTransportOptions = {
  /** Per-call deadline. */
  timeoutMs?: number;
};

/** gRPC transport. `address` is `host:port` of the server's gRPC listener. */
export class GrpcTransport implements BlogTransport {
  private readonly client: Client;
  private readonly service: ServiceDefinition;
  private readonly timeoutMs: number;

  constructor(address: string, options: GrpcTransportOptions = {}) {
    const Ctor = loadBlogServiceConstructor();
    this.client = new Ctor(address.replace(/^https?:\/\//, ''), credentials.createInsecure());
    this.service = Ctor.service;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async register(username: string, email: string, password: string): Promise<AuthResponse> {
    return authMessageSchema.parse(await this.call('Register', { username, email, password }));
  }

  async login(username: string, password: string): Promise<AuthResponse> {
    return authMessageSchema.parse(await this.call('Login', { username, password }));
  }

  async createPost(token: string, fields: PostFields): Promise<Post> {
    return postMessageSchema.parse(await this.call('CreatePost', fields, token));
  }

  async getPost(id: number): Promise<Post> {
    return postMessageSchema.parse(await this.call('GetPost', { id }));
  }

  async updatePost(token: string, id: number, fields: PostFields): Promise<Post> {
    return postMessageSchema.parse(await this.call('UpdatePost', { id, ...fields }, token));
  }

  async deletePost(token: string, id: number): Promise<void> {
    await this.call('DeletePost', { id }, token);
  }

  async listPosts(limit: number, offset: number): Promise<ListPostsResponse> {
    const { page, pageSize } = toPage(limit, offset);
    const res = listPostsMessageSchema.parse(await this.call('ListPosts', { page, pageSize }));
    const start = toLimitOffset(res.page, res.pageSize);
    return { posts: res.posts, limit: start.limit, offset: start.offset, total: res.total };
  }

  close() {
    this.client.close();
  }

  private call(method: MethodName, request: object, token?: string): Promise<unknown> {
    const def = this.service[method];
    if (!def) return Promise.reject(new BlogClientError('transport', `unknown method ${method}`));

    const metadata = new Metadata();
    if (token) metadata.set('authorization', `Bearer ${token}`);

    return new Promise((resolve, reject) => {
      this.client.makeUnaryRequest<object, unknown>(
        def.path,
        def.requestSerialize,
        def.responseDeserialize,
        request,
        metadata,
        { deadline: Date.now() + this.timeoutMs },
        (err, value) => {
          if (err) {
            reject(BlogClientError.fromGrpcStatus(err.code, err.details || err.message, err));
            return;
          }
          resolve(value);
        },
      );
    });
  }
}
