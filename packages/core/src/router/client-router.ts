import type { AccessLevel } from "@testbed/schemas";

export interface ClientPair<TClient> {
  readonly adminClient: TClient;
  readonly userClient: TClient;
}

export class ClientRouter<TClient> {
  private readonly clients: ClientPair<TClient>;

  constructor(clients: ClientPair<TClient>) {
    this.clients = clients;
  }

  /** Anything other than "admin" runs as the user, including levels read from untyped input. */
  resolve(accessLevel: AccessLevel | (string & {}) | undefined): TClient {
    switch (accessLevel) {
      case "admin":
        return this.clients.adminClient;
      case "user":
        return this.clients.userClient;
      default:
        return this.clients.userClient;
    }
  }
}
