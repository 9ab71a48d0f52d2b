import { parseBooleanFlag } from "../env.js";

type Environment = string;
type RuntimeEnv = Record<string, string | undefined>;

const resolveEnvironment = (env: RuntimeEnv): Environment => {
  const explicitEnv = env.APP_ENV ?? env.DROWSY_ENV;

  if (explicitEnv && explicitEnv.trim().length > 0) {
    return explicitEnv;
  }

  const nodeEnv = env.NODE_ENV ?? "development";
  if (nodeEnv && nodeEnv.trim().length > 0) {
    return nodeEnv;
  }

  return "development";
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
  };
  logtail: {
    token: string;
    enabled: boolean;
  };
};

export const resolveMonitoringConfig = (
  runtimeEnv: RuntimeEnv,
): MonitoringConfig => {
  const environment = resolveEnvironment(runtimeEnv);
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = runtimeEnv.SENTRY_DSN ?? "";
  const sentryEnabled =
    Boolean(sentryDsn) &&
    (isProductionLike ||
      parseBooleanFlag(runtimeEnv.ENABLE_SENTRY_IN_DEV, false));

  const logtailToken = runtimeEnv.BETTER_STACK_TOKEN ?? "";
  const logtailEnabled =
    Boolean(logtailToken) &&
    (isProductionLike ||
      parseBooleanFlag(runtimeEnv.ENABLE_BETTER_STACK_IN_DEV, false));

  const rawSampleRate = Number.parseFloat(
    runtimeEnv.SENTRY_TRACES_SAMPLE_RATE ?? "0.1",
  );

  return {
    environment,
    release: runtimeEnv.npm_package_version,
    sentry: {
      dsn: sentryDsn,
      enabled: sentryEnabled,
      tracesSampleRate: Number.isNaN(rawSampleRate) ? 0.1 : rawSampleRate,
    },
    logtail: {
      token: logtailToken,
      enabled: logtailEnabled,
    },
  };
};

// Resolved lazily so that a .env file loaded by the CLI entry point is seen.
let cachedConfig: MonitoringConfig | null = null;

export const getMonitoringConfig = (): MonitoringConfig => {
  if (cachedConfig === null) {
    cachedConfig = resolveMonitoringConfig(process.env);
  }
  return cachedConfig;
};

export const resetMonitoringConfig = (): void => {
  cachedConfig = null;
};
