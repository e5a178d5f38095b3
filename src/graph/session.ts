/**
 * Lazily connected Graph client shared by all Graph operations of a run.
 *
 * Credentials are checked when a pipeline that uses a Graph operation is
 * resolved, so a missing GRAPH_* variable stops the run before anything
 * executes. The client itself (and its first token) is only created when an
 * operation actually calls Graph.
 */

import type { GraphCredentials } from "../config/index.js";
import { ResolutionError } from "../pipeline/index.js";
import type { GraphClient } from "./client.js";

export interface GraphSessionOptions {
  credentials?: GraphCredentials;
  connect(credentials: GraphCredentials): GraphClient;
}

export class GraphSession {
  private readonly options: GraphSessionOptions;
  private connected?: GraphClient;

  constructor(options: GraphSessionOptions) {
    this.options = options;
  }

  get available(): boolean {
    return this.options.credentials !== undefined;
  }

  /**
   * @throws ResolutionError when no credentials are configured
   */
  ensureAvailable(operation: string): GraphCredentials {
    const { credentials } = this.options;
    if (!credentials) {
      throw new ResolutionError(
        `${operation} needs Microsoft Graph credentials: set GRAPH_TENANT_ID, GRAPH_CLIENT_ID, GRAPH_CLIENT_SECRET and GRAPH_USER_ID`,
        { operation }
      );
    }
    return credentials;
  }

  client(operation: string): GraphClient {
    if (!this.connected) {
      this.connected = this.options.connect(this.ensureAvailable(operation));
    }
    return this.connected;
  }
}
