/**
 * Raised when no rewrite attempt fits the length limit. Carries what the
 * operator report needs: the source text, the last attempt and its length.
 */
export class RewriteTooLongError extends Error {
  readonly originalNews: string;
  readonly rewrittenNews: string;
  readonly rewrittenLength: number;
  readonly maxLength: number;
  readonly attempts: number;

  constructor(details: {
    originalNews: string;
    rewrittenNews: string;
    rewrittenLength: number;
    maxLength: number;
    attempts: number;
  }) {
    super(
      `rewritten news is too long: ${details.rewrittenLength} characters after ${details.attempts} attempts (limit ${details.maxLength})`,
    );
    this.name = "RewriteTooLongError";
    this.originalNews = details.originalNews;
    this.rewrittenNews = details.rewrittenNews;
    this.rewrittenLength = details.rewrittenLength;
    this.maxLength = details.maxLength;
    this.attempts = details.attempts;
  }
}
