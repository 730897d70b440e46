export class FormError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class FormNotFoundError extends FormError {
  constructor(readonly formId: string) {
    super(`Form not found: ${formId}`);
  }
}

export class InvalidFormSchemaError extends FormError {
  constructor(readonly reason: string) {
    super(`Invalid form schema: ${reason}`);
  }
}

/** Raised when a form holding a clarification is asked to take answers. */
export class FormNotFillableError extends FormError {
  constructor(readonly formId: string, readonly clarification: string) {
    super(`Form ${formId} has no fields to fill: ${clarification}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
