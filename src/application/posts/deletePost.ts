import type { Post, PostRepository } from '../../domain/posts/post.js';
import type { Identity } from '../auth/identity.js';
import { unwrapOwned } from './ownership.js';
import { logger as rootLogger, type Logger } from '../../infra/logger.js';

export class DeletePostUseCase {
  private readonly log: Logger;

  constructor(
    private postRepo: PostRepository,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ useCase: 'deletePost' });
  }

  async execute(identity: Identity, postId: string): Promise<Post> {
    const result = await this.postRepo.deleteOwned(postId, identity.userId);
    const post = unwrapOwned(result, 'delete');

    this.log.info({ postId, ownerId: post.ownerId }, 'Post deleted');
    return post;
  }
}
