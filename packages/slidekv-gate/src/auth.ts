export class ControlAuthError extends Error {
  constructor() {
    super("Unauthorized");
    this.name = "ControlAuthError";
  }
}

/** Accepts only `Authorization: Bearer <expectedToken>`. */
export function assertControlAuth(headerValue: string | undefined, expectedToken: string): void {
  const [scheme, token, ...rest] = (headerValue ?? "").trim().split(/\s+/);
  if (scheme?.toLowerCase() !== "bearer" || token !== expectedToken || rest.length > 0) {
    throw new ControlAuthError();
  }
}
