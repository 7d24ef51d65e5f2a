export type ModelErrorKind = "ModelNotFound" | "ConnectionFailed" | "TimedOut";

export class ModelError extends Error {
  readonly kind: ModelErrorKind;
  readonly model: string;

  constructor(kind: ModelErrorKind, model: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelError";
    this.kind = kind;
    this.model = model;
  }
}
