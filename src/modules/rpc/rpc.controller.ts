import { Controller, UseFilters, UseInterceptors } from '@nestjs/common';
import { GrpcMethod } from '@nestjs/microservices';
import type { Metadata } from '@grpc/grpc-js';
import { BLOG_SERVICE_NAME } from '../../common/grpc/blog-proto';
import { InFlightLimitInterceptor } from '../../common/interceptors/in-flight-limit.interceptor';
import { RequestTimeoutInterceptor } from '../../common/interceptors/request-timeout.interceptor';
import { resolveLimit, toLimitOffset } from '../../common/pagination/pagination';
import { parseRequest } from '../../common/validation/parse-request';
import { loginSchema, registerSchema } from '../auth/auth.schemas';
import { AuthService } from '../auth/auth.service';
import { TokenService } from '../auth/token.service';
import { postInputSchema } from '../posts/posts.schemas';
import { PostsService } from '../posts/posts.service';
import { GrpcExceptionFilter } from './grpc-exception.filter';
import { authenticateMetadata } from './rpc-auth';
import {
  toAuthResponseMessage,
  toListPostsResponseMessage,
  toPostMessage,
} from './rpc.mappers';
import { listPostsRequestSchema, postIdRequestSchema } from './rpc.schemas';
import type { AuthResponseMessage, EmptyMessage, ListPostsResponseMessage, PostMessage } from './rpc.types';

@Controller()
@UseFilters(GrpcExceptionFilter)
@UseInterceptors(RequestTimeoutInterceptor, InFlightLimitInterceptor)
export class RpcController {
  constructor(
    private readonly auth: AuthService,
    private readonly posts: PostsService,
    private readonly tokens: TokenService,
  ) {}

  @GrpcMethod(BLOG_SERVICE_NAME, 'Register')
  async register(data: unknown): Promise<AuthResponseMessage> {
    const result = await this.auth.register(parseRequest(registerSchema, data));
    return toAuthResponseMessage(result);
  }

  @GrpcMethod(BLOG_SERVICE_NAME, 'Login')
  async login(data: unknown): Promise<AuthResponseMessage> {
    const result = await this.auth.login(parseRequest(loginSchema, data));
    return toAuthResponseMessage(result);
  }

  @GrpcMethod(BLOG_SERVICE_NAME, 'CreatePost')
  async createPost(data: unknown, metadata?: Metadata): Promise<PostMessage> {
    const { userId } = authenticateMetadata(this.tokens, metadata);
    const post = await this.posts.create(userId, parseRequest(postInputSchema, data));
    return toPostMessage(post);
  }

  @GrpcMethod(BLOG_SERVICE_NAME, 'GetPost')
  async getPost(data: unknown): Promise<PostMessage> {
    const { id } = parseRequest(postIdRequestSchema, data);
    return toPostMessage(await this.posts.get(id));
  }

  @GrpcMethod(BLOG_SERVICE_NAME, 'UpdatePost')
  async updatePost(data: unknown, metadata?: Metadata): Promise<PostMessage> {
    const { userId } = authenticateMetadata(this.tokens, metadata);
    const { id } = parseRequest(postIdRequestSchema, data);
    const input = parseRequest(postInputSchema, data);
    return toPostMessage(await this.posts.update(userId, id, input));
  }

  @GrpcMethod(BLOG_SERVICE_NAME, 'DeletePost')
  async deletePost(data: unknown, metadata?: Metadata): Promise<EmptyMessage> {
    const { userId } = authenticateMetadata(this.tokens, metadata);
    const { id } = parseRequest(postIdRequestSchema, data);
    await this.posts.delete(userId, id);
    return {};
  }

  @GrpcMethod(BLOG_SERVICE_NAME, 'ListPosts')
  async listPosts(data: unknown): Promise<ListPostsResponseMessage> {
    const req = parseRequest(listPostsRequestSchema, data);
    const pageSize = resolveLimit(req.pageSize, 'page_size');
    const { limit, offset } = toLimitOffset(req.page || 1, pageSize);
    return toListPostsResponseMessage(await this.posts.list({ limit, offset }));
  }
}
