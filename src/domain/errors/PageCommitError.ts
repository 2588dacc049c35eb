/** Raised to callers that want a run failure as an exception (the CLI does). */
export class PageCommitError extends Error {
  readonly page: number;
  readonly attempts: number;
  readonly lastCommittedPage: number;

  constructor(page: number, attempts: number, lastCommittedPage: number, message: string) {
    const committed =
      lastCommittedPage > 0 ? `pages 1-${String(lastCommittedPage)} are committed` : 'no pages are committed';
    super(`Page ${String(page)} failed after ${String(attempts)} attempt(s), ${committed}: ${message}`);
    this.name = 'PageCommitError';
    this.page = page;
    this.attempts = attempts;
    this.lastCommittedPage = lastCommittedPage;
  }
}
