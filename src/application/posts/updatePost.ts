import type { PostPatch, PostRepository, PostWithAuthor } from '../../domain/posts/post.js';
import { NotFoundError } from '../errors.js';
import type { Identity } from '../auth/identity.js';
import { unwrapOwned } from './ownership.js';
import { logger as rootLogger, type Logger } from '../../infra/logger.js';

/**
 * `null` and `undefined` both mean "leave unchanged".
 */
export interface UpdatePostCommand {
  title?: string | null;
  body?: string | null;
}

export class UpdatePostUseCase {
  private readonly log: Logger;

  constructor(
    private postRepo: PostRepository,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ useCase: 'updatePost' });
  }

  /**
   * Existence is checked before ownership: a caller can learn that a post id
   * exists even when it is not theirs.
   */
  async execute(
    identity: Identity,
    postId: string,
    command: UpdatePostCommand
  ): Promise<PostWithAuthor> {
    const patch: PostPatch = {};
    if (command.title != null) {
      patch.title = command.title.trim();
    }
    if (command.body != null) {
      patch.body = command.body.trim();
    }

    const result = await this.postRepo.updateOwned(postId, identity.userId, patch);
    if (result.status !== 'ok') {
      this.log.debug({ postId, callerId: identity.userId, status: result.status }, 'Update refused');
    }

    const post = unwrapOwned(result, 'update');

    const updated = await this.postRepo.findById(post.id);
    if (!updated) {
      throw new NotFoundError('Post not found');
    }
    return updated;
  }
}
