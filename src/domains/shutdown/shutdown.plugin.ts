import type { Plugin } from "../../core/plugin";
import type { ShutdownCoordinator, SignalTarget, StopRequest } from "./coordinator";
import type { Logger } from "../observability/types";
import { rootLogger } from "../observability/logger";

/** Exit code when shutdown outlives the grace period. */
export const GRACE_EXCEEDED_EXIT_CODE = 2;

export interface ShutdownPluginOptions {
  graceMs: number;
  signals?: SignalTarget;
  exit?: (code: number) => void;
}

/**
 * Turns SIGINT/SIGTERM into stop requests and bounds how long a stop may
 * take: once stop is requested the process has `graceMs` to finish before
 * it is forced out.
 */
export class ShutdownPlugin implements Plugin {
  name = "shutdown";
  private disposeSignals?: () => void;
  private unsubscribe?: () => void;
  private graceTimer?: NodeJS.Timeout;
  private readonly log: Logger;

  constructor(
    private readonly coordinator: ShutdownCoordinator,
    private readonly options: ShutdownPluginOptions,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: "Shutdown" });
  }

  setup(): void {
    this.disposeSignals = this.coordinator.installSignalHandlers(this.options.signals ?? process);
    this.unsubscribe = this.coordinator.onStop((request) => this.armGraceTimer(request));
  }

  get graceArmed(): boolean {
    return this.graceTimer !== undefined;
  }

  private armGraceTimer(request: StopRequest) {
    const { graceMs } = this.options;
    const exit = this.options.exit ?? ((code: number) => process.exit(code));
    this.graceTimer = setTimeout(() => {
      this.log.error(`Shutdown after ${request.reason} exceeded ${graceMs}ms grace period, forcing exit`);
      exit(GRACE_EXCEEDED_EXIT_CODE);
    }, graceMs);
    // Never the reason the process stays alive.
    this.graceTimer.unref();
  }

  stop(): void {
    if (this.graceTimer) clearTimeout(this.graceTimer);
    this.graceTimer = undefined;
    this.unsubscribe?.();
    this.disposeSignals?.();
  }
}
