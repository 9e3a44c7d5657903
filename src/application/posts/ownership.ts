import type { OwnedMutation, Post } from '../../domain/posts/post.js';
import { ForbiddenError, NotFoundError } from '../errors.js';

/**
 * Unwrap an ownership-gated mutation, mapping each refusal to its error.
 */
export function unwrapOwned(result: OwnedMutation<Post>, action: 'update' | 'delete'): Post {
  switch (result.status) {
    case 'ok':
      return result.post;
    case 'not_found':
      throw new NotFoundError('Post not found');
    case 'forbidden':
      throw new ForbiddenError(`You do not have permission to ${action} this post`);
  }
}
