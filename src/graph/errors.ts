/**
 * Failures talking to Microsoft Graph: HTTP errors, Graph error bodies,
 * token acquisition and responses of an unexpected shape.
 */

export class GraphRequestError extends Error {
  public readonly status: number | undefined;
  /** Graph error code, e.g. "ErrorItemNotFound" */
  public readonly code: string | undefined;

  constructor(message: string, status?: number, code?: string) {
    super(message);
    this.name = "GraphRequestError";
    this.status = status;
    this.code = code;
  }
}
