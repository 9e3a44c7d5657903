import type { UserProfile } from '../auth/user.js';

/**
 * Post entity. `ownerId` is fixed at creation and never changes.
 */
export interface Post {
  readonly id: string;
  readonly ownerId: string;
  readonly title: string;
  readonly body: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * Read shape returned to clients: the post with its owner's public profile.
 */
export interface PostWithAuthor extends Post {
  readonly author: UserProfile;
}

export interface NewPost {
  ownerId: string;
  title: string;
  body: string;
}

/**
 * Fields an owner may change. An absent field is left untouched.
 */
export interface PostPatch {
  title?: string;
  body?: string;
}

/**
 * Outcome of an ownership-gated mutation. The existence check runs before the
 * ownership check, so `not_found` wins over `forbidden`.
 */
export type OwnedMutation<T> =
  | { status: 'ok'; post: T }
  | { status: 'not_found' }
  | { status: 'forbidden' };

/**
 * Post store contract. `updateOwned` and `deleteOwned` must check existence,
 * check ownership and mutate as one atomic step.
 */
export interface PostRepository {
  create(post: NewPost): Promise<Post>;
  findById(id: string): Promise<PostWithAuthor | null>;
  /** Newest first. */
  list(): Promise<PostWithAuthor[]>;
  /** Newest first. */
  listByOwner(ownerId: string): Promise<PostWithAuthor[]>;
  updateOwned(id: string, callerId: string, patch: PostPatch): Promise<OwnedMutation<Post>>;
  deleteOwned(id: string, callerId: string): Promise<OwnedMutation<Post>>;
}

export function isEmptyPostPatch(patch: PostPatch): boolean {
  return patch.title === undefined && patch.body === undefined;
}
