export class SessionNotFoundError extends Error {
  public readonly code = 'SESSION_NOT_FOUND';

  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} does not exist or has ended`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionBusyError extends Error {
  public readonly code = 'SESSION_BUSY';

  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} is already answering a message`);
    this.name = 'SessionBusyError';
  }
}
