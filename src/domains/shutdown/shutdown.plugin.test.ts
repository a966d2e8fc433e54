import { describe, it, expect, vi, afterEach } from "vitest";
import { EventEmitter } from "node:events";
import { ShutdownCoordinator } from "./coordinator";
import { ShutdownPlugin, GRACE_EXCEEDED_EXIT_CODE } from "./shutdown.plugin";
import { RelayLogger } from "../observability/logger";

const quiet = new RelayLogger({ level: 'error', format: 'json' });

describe("ShutdownPlugin", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should map SIGTERM to a stop request", () => {
    const signals = new EventEmitter();
    const coordinator = new ShutdownCoordinator(quiet);
    const plugin = new ShutdownPlugin(coordinator, { graceMs: 1000, signals, exit: vi.fn() }, quiet);
    plugin.setup();

    signals.emit('SIGTERM');

    expect(coordinator.request?.reason).toBe('terminate');
    plugin.stop();
  });

  it("should force exit with code 2 once the grace period runs out", async () => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const exit = vi.fn();
    const coordinator = new ShutdownCoordinator(quiet);
    const plugin = new ShutdownPlugin(coordinator, { graceMs: 500, signals: new EventEmitter(), exit }, quiet);
    plugin.setup();

    coordinator.requestStop('operator');
    expect(plugin.graceArmed).toBe(true);
    await vi.advanceTimersByTimeAsync(499);
    expect(exit).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);

    expect(exit).toHaveBeenCalledWith(GRACE_EXCEEDED_EXIT_CODE);
  });

  it("should disarm the grace timer and release signals when stopped in time", async () => {
    vi.useFakeTimers();
    const exit = vi.fn();
    const signals = new EventEmitter();
    const coordinator = new ShutdownCoordinator(quiet);
    const plugin = new ShutdownPlugin(coordinator, { graceMs: 500, signals, exit }, quiet);
    plugin.setup();
    expect(signals.listenerCount('SIGINT')).toBe(1);

    coordinator.requestStop('operator');
    plugin.stop();
    await vi.advanceTimersByTimeAsync(1000);

    expect(exit).not.toHaveBeenCalled();
    expect(plugin.graceArmed).toBe(false);
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });
});
