import type { PostRepository, PostWithAuthor } from '../../domain/posts/post.js';
import type { Identity } from '../auth/identity.js';
import { ForbiddenError, NotFoundError } from '../errors.js';

export class PostQueries {
  constructor(private postRepo: PostRepository) {}

  /** Public read: every post, newest first. */
  async list(): Promise<PostWithAuthor[]> {
    return this.postRepo.list();
  }

  async get(postId: string): Promise<PostWithAuthor> {
    const post = await this.postRepo.findById(postId);
    if (!post) {
      throw new NotFoundError('Post not found');
    }
    return post;
  }

  async listByOwner(identity: Identity, ownerId: string): Promise<PostWithAuthor[]> {
    if (ownerId !== identity.userId) {
      throw new ForbiddenError('You can only list your own posts');
    }
    return this.postRepo.listByOwner(ownerId);
  }
}
