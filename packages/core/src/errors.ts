/**
 * Domain Errors
 *
 * Every failure a request can produce is an ActivityHubError tagged with a
 * kind. The HTTP layer maps kinds to status codes; nothing here retries.
 */

export type ErrorKind =
  | 'NotFound'
  | 'InvalidRange'
  | 'InvalidFormat'
  | 'InvalidState'
  | 'AlreadyExists'
  | 'NotRegistered'

export class ActivityHubError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string) {
    super(message)
    this.name = 'ActivityHubError'
    this.kind = kind
  }
}

export function notFound(message: string): ActivityHubError {
  return new ActivityHubError('NotFound', message)
}

export function invalidRange(message: string): ActivityHubError {
  return new ActivityHubError('InvalidRange', message)
}

export function invalidFormat(message: string): ActivityHubError {
  return new ActivityHubError('InvalidFormat', message)
}

export function invalidState(message: string): ActivityHubError {
  return new ActivityHubError('InvalidState', message)
}

export function isActivityHubError(err: unknown): err is ActivityHubError {
  return err instanceof ActivityHubError
}
