/**
 * A structured command ready for execution.
 * Modules never build raw command strings; they produce Command objects.
 */
export interface Command {
  readonly argv: readonly [string, ...string[]];
  readonly env?: Readonly<Record<string, string>>;
}
