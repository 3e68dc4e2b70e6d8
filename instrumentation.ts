/**
 * Next.js instrumentation hook, called once when the server starts.
 * Loads the appointment dataset; the process exits if it cannot.
 *
 * @see https://nextjs.org/docs/app/building-your-application/optimizing/instrumentation
 */

export async function register() {
  // Only the Node.js server runtime holds the dataset
  if (process.env.NEXT_RUNTIME !== 'nodejs') {
    return;
  }

  const { getConfig } = await import('./lib/config');
  const { logger, setLogLevel } = await import('./lib/logger');

  const config = getConfig();
  setLogLevel(config.logLevel);
  logger.info('[Startup] Dashboard server configuration:', {
    host: config.host,
    port: config.port,
    debug: config.debug,
    datasetUrl: config.datasetUrl,
  });

  let Sentry: typeof import('@sentry/nextjs') | null = null;
  if (config.sentry.enabled && config.sentry.dsn) {
    // Dynamically import Sentry to avoid bundling it when disabled
    Sentry = await import('@sentry/nextjs');
    Sentry.init({
      dsn: config.sentry.dsn,
      environment: process.env.NODE_ENV || 'development',
      tracesSampleRate: 0.01,
      release: process.env.SENTRY_RELEASE,
      ignoreErrors: ['NetworkError', 'AbortError'],
    });
  }

  const { initDashboardContext } = await import('./lib/dashboard-store');
  try {
    await initDashboardContext();
  } catch (error) {
    logger.error('[Startup] Dataset could not be loaded, shutting down:', error);
    if (Sentry) {
      Sentry.captureException(error);
      await Sentry.flush(2000);
    }
    process.exit(1);
  }
}
