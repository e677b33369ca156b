export class StateFileError extends Error {
  constructor(readonly filePath: string, message: string, options?: { cause?: unknown }) {
    super(`${filePath}: ${message}`, options);
    this.name = 'StateFileError';
  }
}

export class NoChatRegisteredError extends Error {
  constructor() {
    super('no target chat registered');
    this.name = 'NoChatRegisteredError';
  }
}
