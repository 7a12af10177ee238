import type { DesignService } from "./lib/server/service";

export async function register(): Promise<void> {
  if (process.env.NEXT_RUNTIME !== "nodejs") {
    return;
  }

  const { getDesignService, shutdownDesignService } = await import("./lib/server/service");
  const { ConfigError } = await import("./lib/server/config");
  const { createLogger } = await import("./lib/server/logger");

  let service: DesignService;
  try {
    service = getDesignService();
  } catch (error) {
    // Routes answer 500 until the environment is fixed.
    if (error instanceof ConfigError) {
      createLogger({ bindings: { service: "shirtsmith" } }).error("service.misconfigured", { issues: error.issues });
      return;
    }
    throw error;
  }
  const { logger } = service;

  const stop = (signal: NodeJS.Signals) => {
    logger.info("service.signal", { signal });
    shutdownDesignService().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("service.shutdown_failed", { error });
        process.exit(1);
      }
    );
  };

  process.once("SIGTERM", stop);
  process.once("SIGINT", stop);
}
