import { Injectable } from '@nestjs/common';
import { and, count, desc, eq, sql } from 'drizzle-orm';
import { UnexpectedError } from '../../common/errors/domain-error';
import type { PageRequest } from '../../common/pagination/pagination';
import { DatabaseService } from '../database/database.service';
import { fromRow, mapPostDbError, runQuery } from '../database/pg-errors';
import { posts, type PostRow } from '../database/schema';
import { createPost, type Post, type PostInput } from './post.model';
import type { NewPost, PostsRepository } from './posts.repository';

function toPost(row: PostRow): Post {
  return fromRow(() => createPost(row));
}

@Injectable()
export class PostsDrizzleRepository implements PostsRepository {
  constructor(private readonly database: DatabaseService) {}

  async create(input: NewPost): Promise<Post> {
    const [row] = await runQuery(
      () =>
        this.database.db
          .insert(posts)
          .values({ title: input.title, content: input.content, authorId: input.authorId })
          .returning(),
      mapPostDbError,
    );
    if (!row) throw new UnexpectedError('post insert returned no row');
    return toPost(row);
  }

  async findById(id: number): Promise<Post | null> {
    const [row] = await runQuery(
      () => this.database.db.select().from(posts).where(eq(posts.id, id)).limit(1),
      mapPostDbError,
    );
    return row ? toPost(row) : null;
  }

  async updateOwned(postId: number, ownerId: number, patch: PostInput): Promise<Post | null> {
    const [row] = await runQuery(
      () =>
        this.database.db
          .update(posts)
          .set({ title: patch.title, content: patch.content, updatedAt: sql`now()` })
          .where(and(eq(posts.id, postId), eq(posts.authorId, ownerId)))
          .returning(),
      mapPostDbError,
    );
    return row ? toPost(row) : null;
  }

  async deleteOwned(postId: number, ownerId: number): Promise<boolean> {
    const rows = await runQuery(
      () =>
        this.database.db
          .delete(posts)
          .where(and(eq(posts.id, postId), eq(posts.authorId, ownerId)))
          .returning({ id: posts.id }),
      mapPostDbError,
    );
    return rows.length > 0;
  }

  async list(page: PageRequest): Promise<Post[]> {
    const rows = await runQuery(
      () =>
        this.database.db
          .select()
          .from(posts)
          .orderBy(desc(posts.createdAt), desc(posts.id))
          .limit(page.pageSize)
          .offset((page.page - 1) * page.pageSize),
      mapPostDbError,
    );
    return rows.map(toPost);
  }

  async count(): Promise<number> {
    const [row] = await runQuery(() => this.database.db.select({ value: count() }).from(posts), mapPostDbError);
    return row?.value ?? 0;
  }
}
