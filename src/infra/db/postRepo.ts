import type { PoolClient } from 'pg';
import { rollbackSafely, type DbPool } from './pool.js';
import {
  NewPost,
  OwnedMutation,
  Post,
  PostPatch,
  PostRepository,
  PostWithAuthor,
  isEmptyPostPatch,
} from '../../domain/posts/post.js';

interface PostRow {
  id: string;
  owner_id: string;
  title: string;
  body: string;
  created_at: Date;
  updated_at: Date;
}

interface PostWithAuthorRow extends PostRow {
  author_name: string;
  author_email: string;
  author_created_at: Date;
  author_updated_at: Date;
}

const POST_COLUMNS = 'id, owner_id, title, body, created_at, updated_at';

const POST_WITH_AUTHOR_SELECT = `
  SELECT p.id, p.owner_id, p.title, p.body, p.created_at, p.updated_at,
         u.name AS author_name, u.email AS author_email,
         u.created_at AS author_created_at, u.updated_at AS author_updated_at
  FROM posts p
  JOIN users u ON u.id = p.owner_id`;

function toPost(row: PostRow): Post {
  return {
    id: row.id,
    ownerId: row.owner_id,
    title: row.title,
    body: row.body,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toPostWithAuthor(row: PostWithAuthorRow): PostWithAuthor {
  return {
    ...toPost(row),
    author: {
      id: row.owner_id,
      name: row.author_name,
      email: row.author_email,
      createdAt: row.author_created_at,
      updatedAt: row.author_updated_at,
    },
  };
}

export class PgPostRepo implements PostRepository {
  constructor(private pool: DbPool) {}

  async create(input: NewPost): Promise<Post> {
    const result = await this.pool.query<PostRow>(
      `INSERT INTO posts (owner_id, title, body)
       VALUES ($1, $2, $3)
       RETURNING ${POST_COLUMNS}`,
      [input.ownerId, input.title, input.body]
    );
    return toPost(result.rows[0]);
  }

  async findById(id: string): Promise<PostWithAuthor | null> {
    const result = await this.pool.query<PostWithAuthorRow>(
      `${POST_WITH_AUTHOR_SELECT} WHERE p.id = $1`,
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toPostWithAuthor(result.rows[0]);
  }

  async list(): Promise<PostWithAuthor[]> {
    const result = await this.pool.query<PostWithAuthorRow>(
      `${POST_WITH_AUTHOR_SELECT} ORDER BY p.created_at DESC`
    );
    return result.rows.map(toPostWithAuthor);
  }

  async listByOwner(ownerId: string): Promise<PostWithAuthor[]> {
    const result = await this.pool.query<PostWithAuthorRow>(
      `${POST_WITH_AUTHOR_SELECT}
       WHERE p.owner_id = $1
       ORDER BY p.created_at DESC`,
      [ownerId]
    );
    return result.rows.map(toPostWithAuthor);
  }

  async updateOwned(id: string, callerId: string, patch: PostPatch): Promise<OwnedMutation<Post>> {
    return this.withLockedPost(id, callerId, async (client, post) => {
      if (isEmptyPostPatch(patch)) {
        return post;
      }

      const result = await client.query<PostRow>(
        `UPDATE posts
         SET title = COALESCE($2, title),
             body = COALESCE($3, body),
             updated_at = NOW()
         WHERE id = $1
         RETURNING ${POST_COLUMNS}`,
        [id, patch.title ?? null, patch.body ?? null]
      );
      return toPost(result.rows[0]);
    });
  }

  async deleteOwned(id: string, callerId: string): Promise<OwnedMutation<Post>> {
    return this.withLockedPost(id, callerId, async (client, post) => {
      await client.query('DELETE FROM posts WHERE id = $1', [id]);
      return post;
    });
  }

  /**
   * Lock the row, check existence then ownership, and run the mutation in the
   * same transaction.
   */
  private async withLockedPost(
    id: string,
    callerId: string,
    mutate: (client: PoolClient, post: Post) => Promise<Post>
  ): Promise<OwnedMutation<Post>> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const locked = await client.query<PostRow>(
        `SELECT ${POST_COLUMNS} FROM posts WHERE id = $1 FOR UPDATE`,
        [id]
      );

      if (locked.rows.length === 0) {
        await client.query('ROLLBACK');
        return { status: 'not_found' };
      }

      const post = toPost(locked.rows[0]);
      if (post.ownerId !== callerId) {
        await client.query('ROLLBACK');
        return { status: 'forbidden' };
      }

      const result = await mutate(client, post);
      await client.query('COMMIT');
      return { status: 'ok', post: result };
    } catch (error) {
      await rollbackSafely(client);
      throw error;
    } finally {
      client.release();
    }
  }
}
