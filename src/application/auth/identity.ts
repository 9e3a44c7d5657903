/**
 * Authenticated caller, as established by the auth gate from a valid token.
 * Carries the user id only; profile data must be re-fetched from the store.
 */
export interface Identity {
  readonly userId: string;
}
