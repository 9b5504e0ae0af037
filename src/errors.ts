export type ErrorContext = {
  population?: string;
  projection?: string;
};

function withContext(msg: string, ctx: ErrorContext): string {
  const parts: string[] = [];
  if (ctx.population) parts.push(`population '${ctx.population}'`);
  if (ctx.projection) parts.push(`projection '${ctx.projection}'`);
  return parts.length > 0 ? `${msg} (${parts.join(", ")})` : msg;
}

/** Fatal problem with the shape of the network; aborts the whole pass. */
export class StructuralError extends Error {
  readonly population?: string;
  readonly projection?: string;

  constructor(msg: string, ctx: ErrorContext = {}) {
    super(withContext(msg, ctx));
    this.name = "StructuralError";
    this.population = ctx.population;
    this.projection = ctx.projection;
  }
}

export class InvalidRoleError extends StructuralError {
  constructor(readonly role: string, ctx: ErrorContext = {}) {
    super(`Invalid port connection role '${role}'`, ctx);
    this.name = "InvalidRoleError";
  }
}

export class ReservedNameError extends StructuralError {
  constructor(readonly reserved: string, what: string, ctx: ErrorContext = {}) {
    super(`${what} may not be named '${reserved}', it is reserved for the cell dynamics`, ctx);
    this.name = "ReservedNameError";
  }
}

export class NamespaceCollisionError extends StructuralError {
  constructor(readonly symbol: string, detail: string, ctx: ErrorContext = {}) {
    super(`Namespace collision on '${symbol}': ${detail}`, ctx);
    this.name = "NamespaceCollisionError";
  }
}

export class NameCollisionError extends StructuralError {
  constructor(readonly duplicate: string, kind: string, ctx: ErrorContext = {}) {
    super(`Duplicate ${kind} name '${duplicate}'`, ctx);
    this.name = "NameCollisionError";
  }
}

export class UnknownPortError extends StructuralError {
  constructor(readonly port: string, owner: string, ctx: ErrorContext = {}) {
    super(`'${owner}' has no port named '${port}'`, ctx);
    this.name = "UnknownPortError";
  }
}

/** Malformed network document or rules file. */
export class InputError extends Error {
  constructor(msg: string, readonly source?: string) {
    super(source ? `${source}: ${msg}` : msg);
    this.name = "InputError";
  }
}
