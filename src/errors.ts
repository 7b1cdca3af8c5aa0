// Patient Dialogue Engine - Error types

export type Collaborator = "stt" | "tts" | "llm";

/**
 * A speech recognizer, synthesizer or language model call failed. Recoverable
 * failures leave the conversation listening; an unrecoverable one ends it.
 */
export class CollaboratorError extends Error {
  readonly collaborator: Collaborator;
  readonly recoverable: boolean;
  /** The call was abandoned because it exceeded its deadline. */
  readonly timedOut: boolean;

  constructor(
    collaborator: Collaborator,
    message: string,
    options: { recoverable?: boolean; timedOut?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
    this.recoverable = options.recoverable ?? true;
    this.timedOut = options.timedOut ?? false;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
