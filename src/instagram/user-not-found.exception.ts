/**
 * The requested profile page has no posts tab: the account does not exist
 * or is not visible to the scraping session.
 */
export class UserNotFoundException extends Error {
  readonly reason = 'User not found';

  constructor(readonly username: string) {
    super(`User not found: ${username}`);
    this.name = 'UserNotFoundException';
  }
}
