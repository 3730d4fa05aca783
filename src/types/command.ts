/**
 * One external program invocation. argv goes to execFile untouched; shell
 * pipelines are wrapped as ["bash", "-c", script] by the command layer.
 * env entries are layered over the server's environment.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
}
