import type { DevstrapConfig } from "../types/config.js";
import type { EnvironmentProbe } from "../probe/environment.js";
import type { Executor } from "../execution/executor.js";

/**
 * Shared bootstrap context, created once by the CLI and passed to every step.
 * `platform` is injected so the Linux/non-Linux split can be exercised anywhere.
 */
export interface BootstrapContext {
  readonly config: DevstrapConfig;
  readonly probe: EnvironmentProbe;
  readonly executor: Executor;
  readonly platform: NodeJS.Platform;
}
