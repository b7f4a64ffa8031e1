import { join } from 'path';
import { GrpcTransport, loadBlogServiceConstructor } from './grpc-transport';

describe('loadBlogServiceConstructor', () => {
  it('exposes every BlogService method under the quill.v1 package', () => {
    const ctor = loadBlogServiceConstructor();
    expect(Object.keys(ctor.service).sort()).toEqual(
      ['CreatePost', 'DeletePost', 'GetPost', 'ListPosts', 'Login', 'Register', 'UpdatePost'].sort(),
    );
    expect(ctor.service.ListPosts?.path).toBe('/quill.v1.BlogService/ListPosts');
  });

  it('round-trips a list request through the message codec with camelCase fields', () => {
    const { ListPosts } = loadBlogServiceConstructor().service;
    const encoded = ListPosts?.requestSerialize({ page: 2, pageSize: 10 });
    expect(encoded).toBeInstanceOf(Buffer);
    expect(ListPosts?.requestDeserialize(encoded ?? Buffer.alloc(0))).toEqual({ page: 2, pageSize: 10 });
  });

  it('fails clearly for a proto without the service', () => {
    expect(() => loadBlogServiceConstructor(join(__dirname, 'does-not-exist.proto'))).toThrow();
  });
});

describe('GrpcTransport', () => {
  it('creates a lazy channel and closes it', () => {
    const transport = new GrpcTransport('127.0.0.1:1');
    expect(() => transport.close()).not.toThrow();
  });
});
