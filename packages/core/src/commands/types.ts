import type { AccessLevel, CommandScope } from "@testbed/schemas";

/**
 * A unit of provisioning work. `execute` performs the remote side effect with
 * the client matching `accessLevel` and returns the id of what it touched.
 */
export interface Command<TClient> {
  readonly accessLevel: AccessLevel;
  execute(client: TClient): Promise<string>;
}

/**
 * A command whose side effect can be undone. Once executed it is owned by the
 * stack of its `scope` and disposed when that scope ends.
 */
export interface DisposableCommand<TClient> extends Command<TClient> {
  readonly scope: CommandScope;
  dispose(client: TClient): Promise<void>;
}

export function isDisposableCommand<TClient>(
  command: Command<TClient>,
): command is DisposableCommand<TClient> {
  return "dispose" in command && typeof command.dispose === "function" && "scope" in command;
}
