export class ProfileSaveError extends Error {
  readonly profileId: string;

  constructor(profileId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProfileSaveError';
    this.profileId = profileId;
  }
}

export class ProfileNotFoundError extends Error {
  constructor(readonly profileId: string) {
    super(`Profile not found: ${profileId}`);
    this.name = 'ProfileNotFoundError';
  }
}

/** Thrown when a draft operation runs before any profile was loaded. */
export class DraftNotLoadedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation} before a profile is loaded`);
    this.name = 'DraftNotLoadedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
