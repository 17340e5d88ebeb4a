export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export class NotLinkedError extends Error {
  constructor() {
    super('No Swarm drive is linked. Run "swarm-dropbox link" first.');
    this.name = "NotLinkedError";
  }
}
