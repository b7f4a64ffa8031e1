export { BlogClient } from './blog-client';
export { BlogClientError, type BlogClientErrorKind } from './client-error';
export { GrpcTransport, type GrpcTransportOptions } from './grpc-transport';
export { HttpTransport, type HttpTransportOptions } from './http-transport';
export type { AuthResponse, ListPostsResponse, Post, PostFields, User } from './models';
export { DEFAULT_TOKEN_PATH, FileTokenStore, MemoryTokenStore, parseToken, type TokenStore } from './token-store';
export type { BlogTransport } from './transport';
