/**
 * An error that is the user's to fix
 *
 * The CLI prints only the message of these, no stack trace.
 */
export class SimpleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : `${e}`;
}

/**
 * The 'code' property that Node attaches to system errors (ENOENT and friends)
 */
export function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e) {
    const code = e.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
