export type ConfigurationContext = {
  rule?: string;
  effect?: string;
  patientIndex?: number;
  path?: string;
};

export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A malformed profile: bad distribution, unknown relationship keyword,
 * condition over an attribute the patient does not carry. Always fatal.
 */
export class ConfigurationError extends GenerationError {
  readonly detail: string;
  readonly context: ConfigurationContext;

  constructor(detail: string, context: ConfigurationContext = {}) {
    super(withContext(detail, context));
    this.detail = detail;
    this.context = context;
  }

  /** Re-raise with the rule/effect/patient the failure happened under. */
  within(context: ConfigurationContext): ConfigurationError {
    const merged = { ...context, ...this.context };
    const err = new ConfigurationError(this.detail, merged);
    err.stack = this.stack;
    return err;
  }
}

/** A reference that does not resolve inside its bundle after assembly. */
export class IntegrityError extends GenerationError {
  readonly reference: string;
  readonly bundleIndex: number;

  constructor(message: string, reference: string, bundleIndex: number) {
    super(`${message} (reference "${reference}", bundle ${bundleIndex})`);
    this.reference = reference;
    this.bundleIndex = bundleIndex;
  }
}

function withContext(message: string, context: ConfigurationContext): string {
  const parts: string[] = [];
  if (context.rule) parts.push(`rule "${context.rule}"`);
  if (context.effect) parts.push(`effect ${context.effect}`);
  if (context.patientIndex != null) parts.push(`patient #${context.patientIndex}`);
  if (context.path) parts.push(`at ${context.path}`);
  return parts.length ? `${message} [${parts.join(", ")}]` : message;
}
