'use client';

import { useEffect } from 'react';

/**
 * Browser-side Sentry setup, behind NEXT_PUBLIC_ENABLE_SENTRY.
 * Renders nothing.
 */
export function SentryClientInit() {
  useEffect(() => {
    const dsn = process.env.NEXT_PUBLIC_SENTRY_DSN;
    if (process.env.NEXT_PUBLIC_ENABLE_SENTRY !== 'true' || !dsn) return;

    import('@sentry/nextjs')
      .then((Sentry) => {
        Sentry.init({
          dsn,
          environment: process.env.NODE_ENV || 'development',
          tracesSampleRate: 0.01,
          replaysSessionSampleRate: 0,
          replaysOnErrorSampleRate: 0,
          ignoreErrors: ['NetworkError', 'Network request failed', 'Failed to fetch', 'AbortError'],
        });
      })
      .catch((error: unknown) => {
        console.warn('[Sentry] Failed to initialize client-side:', error);
      });
  }, []);

  return null;
}
