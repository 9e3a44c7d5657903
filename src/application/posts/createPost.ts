import type { PostRepository, PostWithAuthor } from '../../domain/posts/post.js';
import { NotFoundError } from '../errors.js';
import type { Identity } from '../auth/identity.js';
import { logger as rootLogger, type Logger } from '../../infra/logger.js';

export interface CreatePostCommand {
  title: string;
  body: string;
}

export class CreatePostUseCase {
  private readonly log: Logger;

  constructor(
    private postRepo: PostRepository,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ useCase: 'createPost' });
  }

  async execute(identity: Identity, command: CreatePostCommand): Promise<PostWithAuthor> {
    // Owner always comes from the authenticated identity, never from input
    const post = await this.postRepo.create({
      ownerId: identity.userId,
      title: command.title.trim(),
      body: command.body.trim(),
    });

    this.log.info({ postId: post.id, ownerId: post.ownerId }, 'Post created');

    const created = await this.postRepo.findById(post.id);
    if (!created) {
      throw new NotFoundError('Post not found');
    }
    return created;
  }
}
