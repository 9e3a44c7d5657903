import { randomUUID } from 'crypto';
import {
  NewPost,
  OwnedMutation,
  Post,
  PostPatch,
  PostRepository,
  PostWithAuthor,
  isEmptyPostPatch,
} from '../../domain/posts/post.js';
import { toProfile, type UserRepository } from '../../domain/auth/user.js';

function newestFirst(a: Post, b: Post): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

/**
 * In-process post store. Ownership checks and the mutation they guard run in
 * one synchronous block. Authors are resolved through the user store; a post
 * whose owner is gone is not returned.
 */
export class InMemoryPostRepo implements PostRepository {
  private readonly posts = new Map<string, Post>();

  constructor(
    private readonly users: UserRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async create(input: NewPost): Promise<Post> {
    const now = this.clock();
    const post: Post = {
      id: randomUUID(),
      ownerId: input.ownerId,
      title: input.title,
      body: input.body,
      createdAt: now,
      updatedAt: now,
    };
    this.posts.set(post.id, post);
    return post;
  }

  async findById(id: string): Promise<PostWithAuthor | null> {
    const post = this.posts.get(id);
    return post ? this.withAuthor(post) : null;
  }

  async list(): Promise<PostWithAuthor[]> {
    return this.withAuthors([...this.posts.values()].sort(newestFirst));
  }

  async listByOwner(ownerId: string): Promise<PostWithAuthor[]> {
    return this.withAuthors(
      [...this.posts.values()].filter((p) => p.ownerId === ownerId).sort(newestFirst)
    );
  }

  async updateOwned(id: string, callerId: string, patch: PostPatch): Promise<OwnedMutation<Post>> {
    const existing = this.posts.get(id);
    if (!existing) {
      return { status: 'not_found' };
    }
    if (existing.ownerId !== callerId) {
      return { status: 'forbidden' };
    }
    if (isEmptyPostPatch(patch)) {
      return { status: 'ok', post: existing };
    }

    const updated: Post = {
      ...existing,
      title: patch.title ?? existing.title,
      body: patch.body ?? existing.body,
      updatedAt: this.clock(),
    };
    this.posts.set(id, updated);
    return { status: 'ok', post: updated };
  }

  async deleteOwned(id: string, callerId: string): Promise<OwnedMutation<Post>> {
    const existing = this.posts.get(id);
    if (!existing) {
      return { status: 'not_found' };
    }
    if (existing.ownerId !== callerId) {
      return { status: 'forbidden' };
    }
    this.posts.delete(id);
    return { status: 'ok', post: existing };
  }

  private async withAuthor(post: Post): Promise<PostWithAuthor | null> {
    const owner = await this.users.findById(post.ownerId);
    return owner ? { ...post, author: toProfile(owner) } : null;
  }

  private async withAuthors(posts: Post[]): Promise<PostWithAuthor[]> {
    const resolved = await Promise.all(posts.map((post) => this.withAuthor(post)));
    return resolved.filter((post): post is PostWithAuthor => post !== null);
  }
}
