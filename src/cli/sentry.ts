import { getMonitoringConfig } from "../shared/config/monitoring.js";
import type { Logger } from "../shared/logger.js";

type SentryNodeModule = typeof import("@sentry/node");

let cachedSentryModule: SentryNodeModule | null = null;

let initialised = false;

const loadSentryModule = async (
  logger: Logger,
): Promise<SentryNodeModule | null> => {
  if (cachedSentryModule) {
    return cachedSentryModule;
  }

  try {
    cachedSentryModule = await import("@sentry/node");
  } catch (error) {
    logger.warn("Failed to load @sentry/node", {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  return cachedSentryModule;
};

export const initCliSentry = async (logger: Logger): Promise<void> => {
  const monitoring = getMonitoringConfig();
  if (!monitoring.sentry.enabled || initialised) {
    if (!monitoring.sentry.enabled) {
      logger.debug("Sentry disabled by configuration");
    }
    return;
  }

  const sentry = await loadSentryModule(logger);
  if (!sentry) {
    logger.debug("Sentry initialisation skipped: module unavailable");
    return;
  }

  sentry.init({
    dsn: monitoring.sentry.dsn,
    environment: monitoring.environment,
    release: monitoring.release,
    tracesSampleRate: monitoring.sentry.tracesSampleRate,
  });
  sentry.setTag("process", "cli");

  initialised = true;
};

export const captureCliException = (error: unknown): void => {
  if (!initialised || !cachedSentryModule) {
    return;
  }

  const normalisedError =
    error instanceof Error ? error : new Error(String(error));

  cachedSentryModule.captureException(normalisedError);
};

export const flushCliSentry = async (timeoutMs = 2000): Promise<void> => {
  if (!initialised || !cachedSentryModule) {
    return;
  }
  await cachedSentryModule.flush(timeoutMs);
};
