import { monitoringConfig, scrubRecord } from "../config/monitoring";
import { getLogger } from "../logger";

type SentryNodeModule = typeof import("@sentry/node");

const logger = getLogger("sentry", "runtime");

let sentryModule: SentryNodeModule | null = null;

let initialised = false;

/**
 * Initialises `@sentry/node` when a DSN is configured for this environment.
 * Safe to call more than once; resolves to whether error tracking is active.
 */
export const initSentry = async (): Promise<boolean> => {
  if (initialised) {
    return true;
  }

  if (!monitoringConfig.sentry.enabled) {
    logger.debug("Sentry disabled by configuration");
    return false;
  }

  try {
    sentryModule = await import("@sentry/node");
  } catch (error) {
    logger.warn("Failed to load @sentry/node", {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }

  sentryModule.init({
    dsn: monitoringConfig.sentry.dsn,
    environment: monitoringConfig.environment,
    release: monitoringConfig.release,
    tracesSampleRate: monitoringConfig.sentry.tracesSampleRate,
    beforeSend: (event) => {
      if (event.extra) {
        event.extra = scrubRecord(event.extra);
      }
      event.breadcrumbs?.forEach((breadcrumb) => {
        if (breadcrumb.data) {
          breadcrumb.data = scrubRecord(breadcrumb.data);
        }
      });
      if (event.user) {
        event.user =
          event.user.id != null ? { id: String(event.user.id) } : undefined;
      }
      event.request = undefined;
      return event;
    },
  });

  sentryModule.setTag("component", "proximity-fusion");
  sentryModule.setContext("runtime", {
    pid: process.pid,
    platform: process.platform,
    node: process.versions.node,
  });

  initialised = true;
  return true;
};

export const captureException = (
  error: unknown,
  extra: Record<string, unknown> = {},
): void => {
  if (!initialised || !sentryModule) {
    return;
  }

  const normalisedError =
    error instanceof Error ? error : new Error(String(error));

  sentryModule.captureException(normalisedError, { extra });
};

export const isSentryInitialised = (): boolean => initialised;
