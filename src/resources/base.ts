import type { ClientConfig } from "../config";
import { AuthError } from "../errors";
import type { Transport } from "../transport";

export class BaseResource {
  protected transport: Transport;
  protected config: Pick<ClientConfig, "apiUrl" | "token">;

  constructor(transport: Transport, config: Pick<ClientConfig, "apiUrl" | "token">) {
    this.transport = transport;
    this.config = config;
  }

  /** The configured token; fails before any request when there is none. */
  protected credential(): string {
    const token = this.config.token?.trim();
    if (!token) {
      throw new AuthError("No API token configured");
    }
    return token;
  }
}
