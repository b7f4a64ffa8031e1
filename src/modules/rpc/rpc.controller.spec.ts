import { Metadata, status as GrpcStatus } from '@grpc/grpc-js';
import { RpcException } from '@nestjs/microservices';
import { FakePasswordHasher } from '../../../test/support/fake-password-hasher';
import { InMemoryPostsRepository } from '../../../test/support/in-memory-posts.repository';
import { InMemoryUsersRepository } from '../../../test/support/in-memory-users.repository';
import { tickingClock } from '../../../test/support/ticking-clock';
import { AuthService } from '../auth/auth.service';
import { TokenService } from '../auth/token.service';
import { PostsService } from '../posts/posts.service';
import { toGrpcError } from './grpc-exception.filter';
import { RpcController } from './rpc.controller';

const SECRET = 'test-secret-test-secret-test-secret';

function setup() {
  const users = new InMemoryUsersRepository();
  const postsRepo = new InMemoryPostsRepository(tickingClock());
  const tokens = new TokenService(SECRET, 3600);
  const controller = new RpcController(
    new AuthService(users, new FakePasswordHasher(), tokens),
    new PostsService(postsRepo),
    tokens,
  );
  return { controller, postsRepo };
}

function bearer(token: string): Metadata {
  const md = new Metadata();
  md.set('authorization', `Bearer ${token}`);
  return md;
}

/** Runs `fn` and returns the gRPC status the exception filter would send. */
async function grpcFailure(fn: () => Promise<unknown>) {
  try {
    await fn();
  } catch (err) {
    return toGrpcError(err);
  }
  throw new Error('expected failure');
}

describe('RpcController', () => {
  it('registers and logs in with camelCase messages', async () => {
    const { controller } = setup();
    const reg = await controller.register({ username: 'alice', email: 'Alice@Example.com', password: 'password123' });
    expect(reg.user).toMatchObject({ id: 1, username: 'alice', email: 'alice@example.com' });
    expect(reg.accessToken).toEqual(expect.any(String));

    const login = await controller.login({ username: 'alice', password: 'password123' });
    expect(login.user.id).toBe(1);
  });

  it('maps domain failures to gRPC codes', async () => {
    const { controller } = setup();
    await controller.register({ username: 'alice', email: 'a@example.com', password: 'password123' });

    await expect(
      grpcFailure(() => controller.register({ username: 'alice', email: 'b@example.com', password: 'password123' })),
    ).resolves.toEqual({ code: GrpcStatus.ALREADY_EXISTS, message: 'resource already exists: username' });
    await expect(grpcFailure(() => controller.login({ username: 'alice', password: 'nope-nope' }))).resolves.toEqual({
      code: GrpcStatus.UNAUTHENTICATED,
      message: 'invalid credentials',
    });
    await expect(grpcFailure(() => controller.getPost({ id: 404 }))).resolves.toEqual({
      code: GrpcStatus.NOT_FOUND,
      message: 'resource not found: post',
    });
  });

  it('treats proto defaults as missing fields', async () => {
    const { controller } = setup();
    const failure = await grpcFailure(() => controller.register({ username: '', email: '', password: '' }));
    expect(failure.code).toBe(GrpcStatus.INVALID_ARGUMENT);
  });

  it('requires bearer metadata on mutations', async () => {
    const { controller } = setup();
    const missing = await grpcFailure(() => controller.createPost({ title: 't', content: 'c' }, new Metadata()));
    expect(missing).toEqual({ code: GrpcStatus.UNAUTHENTICATED, message: 'missing authorization metadata' });

    const basic = new Metadata();
    basic.set('authorization', 'Basic abc');
    const wrongScheme = await grpcFailure(() => controller.createPost({ title: 't', content: 'c' }, basic));
    expect(wrongScheme.code).toBe(GrpcStatus.UNAUTHENTICATED);

    const invalid = await grpcFailure(() => controller.createPost({ title: 't', content: 'c' }, bearer('garbage')));
    expect(invalid).toEqual({ code: GrpcStatus.UNAUTHENTICATED, message: 'invalid token' });
  });

  it('enforces ownership on update and delete', async () => {
    const { controller } = setup();
    const alice = await controller.register({ username: 'alice', email: 'a@example.com', password: 'password123' });
    const bob = await controller.register({ username: 'bob', email: 'b@example.com', password: 'password123' });
    const post = await controller.createPost({ title: 'Hello', content: 'World' }, bearer(alice.accessToken));
    expect(post).toMatchObject({ title: 'Hello', authorId: alice.user.id });

    const denied = await grpcFailure(() =>
      controller.updatePost({ id: post.id, title: 'x', content: 'y' }, bearer(bob.accessToken)),
    );
    expect(denied.code).toBe(GrpcStatus.PERMISSION_DENIED);
    const deniedDelete = await grpcFailure(() => controller.deletePost({ id: post.id }, bearer(bob.accessToken)));
    expect(deniedDelete.code).toBe(GrpcStatus.PERMISSION_DENIED);

    const updated = await controller.updatePost({ id: post.id, title: 'x', content: 'y' }, bearer(alice.accessToken));
    expect(updated).toMatchObject({ id: post.id, title: 'x', content: 'y' });
    await expect(controller.deletePost({ id: post.id }, bearer(alice.accessToken))).resolves.toEqual({});

    const gone = await grpcFailure(() => controller.getPost({ id: post.id }));
    expect(gone.code).toBe(GrpcStatus.NOT_FOUND);
  });

  describe('ListPosts', () => {
    it('treats page 0 and page_size 0 as defaults', async () => {
      const { controller, postsRepo } = setup();
      const spy = jest.spyOn(postsRepo, 'list');
      const res = await controller.listPosts({ page: 0, pageSize: 0 });
      expect(spy).toHaveBeenCalledWith({ page: 1, pageSize: 20 });
      expect(res).toEqual({ posts: [], page: 1, pageSize: 20, total: 0 });
    });

    it('passes the requested page through', async () => {
      const { controller, postsRepo } = setup();
      const spy = jest.spyOn(postsRepo, 'list');
      await controller.listPosts({ page: 3, pageSize: 10 });
      expect(spy).toHaveBeenCalledWith({ page: 3, pageSize: 10 });
    });

    it('accepts 100 and rejects 101', async () => {
      const { controller } = setup();
      await expect(controller.listPosts({ page: 1, pageSize: 100 })).resolves.toMatchObject({ pageSize: 100 });
      const failure = await grpcFailure(() => controller.listPosts({ page: 1, pageSize: 101 }));
      expect(failure).toEqual({
        code: GrpcStatus.INVALID_ARGUMENT,
        message: "validation failed for 'page_size': must be 1..100",
      });
    });
  });
});

describe('toGrpcError', () => {
  it('hides unexpected detail', () => {
    expect(toGrpcError(new Error('db exploded'))).toEqual({ code: GrpcStatus.INTERNAL, message: 'internal error' });
  });

  it('passes RpcException payloads through', () => {
    const err = new RpcException({ code: GrpcStatus.DEADLINE_EXCEEDED, message: 'request timed out' });
    expect(toGrpcError(err)).toEqual({ code: GrpcStatus.DEADLINE_EXCEEDED, message: 'request timed out' });
  });
});
