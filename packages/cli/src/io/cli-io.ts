export type CliSignal = 'SIGINT' | 'SIGTERM';

export interface CliIo {
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;

  writeOut(chunk: string): void;
  writeErr(chunk: string): void;
  exit(code: number): never;
  /**
   * Subscribes to a termination signal.
   *
   * @returns A function removing the listener.
   */
  onSignal(signal: CliSignal, listener: () => void): () => void;
}
