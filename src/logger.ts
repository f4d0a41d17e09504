import { PlatformLogger } from "@effect/platform";
import { Effect, Layer, Logger } from "effect";
import { AppConfig } from "./config.js";

/**
 * Writes logfmt lines to LOG_FILE, beside the console or, when quiet, instead of it.
 */
export const makeLoggerLayer = (options: { readonly quiet: boolean }) =>
  Layer.unwrapEffect(Effect.gen(function* () {
    const file = yield* AppConfig.logging.file;
    const fileLogger = Logger.logfmtLogger.pipe(PlatformLogger.toFile(file));

    return options.quiet
      ? Logger.replaceScoped(Logger.defaultLogger, fileLogger)
      : Logger.addScoped(fileLogger);
  }));
