export type CredentialErrorKind = 'NOT_FOUND' | 'FORBIDDEN' | 'UNAUTHORIZED' | 'VALIDATION';

export class CredentialError extends Error {
  constructor(
    public readonly kind: CredentialErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'CredentialError';
  }
}
