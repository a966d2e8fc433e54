#!/usr/bin/env tsx
import { Application } from "./core/app";
import { ConfigError, describeError } from "./core/errors";
import { loadConfig } from "./domains/config/config";
import { rootLogger } from "./domains/observability/logger";
import { ShutdownCoordinator } from "./domains/shutdown/coordinator";
import { ShutdownPlugin } from "./domains/shutdown/shutdown.plugin";
import { CapturePlugin } from "./domains/capture/capture.plugin";
import { ProcessingPlugin } from "./domains/processing/processing.plugin";
import { EXIT_FATAL, EXIT_OK, USAGE, UsageError, exitCodeFor, parseCli } from "./cli";

async function bootstrap(argv: string[]): Promise<number> {
  const request = parseCli(argv);
  if (request.kind === "help") {
    console.log(USAGE);
    return EXIT_OK;
  }

  const { role, configFile } = request.options;
  const config = await loadConfig({ file: configFile });
  rootLogger.configure(config.log);

  const coordinator = new ShutdownCoordinator(rootLogger);
  const app = new Application(rootLogger);
  await app.use(new ShutdownPlugin(coordinator, { graceMs: config.shutdown.graceMs }));

  const pipeline = role === "capture"
    ? new CapturePlugin(config, coordinator, {}, rootLogger.child({ component: "Capture" }))
    : new ProcessingPlugin(config, coordinator, {}, rootLogger.child({ component: "Processing" }));
  await app.use(pipeline);

  let code = EXIT_FATAL;
  try {
    await app.start();
    code = exitCodeFor(await pipeline.done);
  } finally {
    await app.stop();
  }
  return code;
}

process.on("unhandledRejection", (reason) => {
  rootLogger.error("Unhandled rejection", reason);
  process.exit(EXIT_FATAL);
});

bootstrap(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
    } else if (error instanceof ConfigError) {
      rootLogger.error(error.message, undefined, { issues: error.issues });
    } else {
      rootLogger.error(`Failed to run: ${describeError(error)}`, error);
    }
    process.exit(EXIT_FATAL);
  }
);
