export class StorageUnavailableException extends Error {
  readonly code: string;

  constructor(code: string, detail: string) {
    super(`Rule storage unavailable (${code}): ${detail}`);
    this.name = 'StorageUnavailableException';
    this.code = code;
  }
}
