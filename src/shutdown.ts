import { InjectorService } from "@tsed/di";
import { $log } from "@tsed/logger";

/**
 * Builds the process shutdown. A signal during the session and the end of
 * `run()` both call it; only the first call destroys the injector and exits.
 */
export function createShutdown(
  injector: Pick<InjectorService, "destroy">,
  exit: (code: number) => void = (code) => process.exit(code)
): (code: number) => Promise<void> {
  let shuttingDown = false;

  return async (code: number) => {
    if (shuttingDown) return;
    shuttingDown = true;

    try {
      await injector.destroy();
    } catch (err) {
      $log.error("Error closing DB connections", err);
    }
    exit(code);
  };
}
