'use client';

/**
 * Root error boundary: replaces the whole document when the layout itself fails.
 *
 * @see https://nextjs.org/docs/app/api-reference/file-conventions/error-handling
 */

import { useEffect } from 'react';
import * as Sentry from '@sentry/nextjs';

interface GlobalErrorProps {
  error: Error & { digest?: string };
  reset: () => void;
}

export default function GlobalError({ error, reset }: GlobalErrorProps) {
  useEffect(() => {
    console.error('Unhandled render error:', error);
    if (process.env.NEXT_PUBLIC_ENABLE_SENTRY === 'true') {
      Sentry.captureException(error, {
        tags: { error_boundary: 'global' },
        extra: { digest: error.digest },
      });
    }
  }, [error]);

  return (
    <html lang="en">
      <body>
        <div
          style={{
            display: 'flex',
            flexDirection: 'column',
            alignItems: 'center',
            justifyContent: 'center',
            minHeight: '100vh',
            padding: '2rem',
            fontFamily: 'system-ui, -apple-system, sans-serif',
            backgroundColor: '#1E1E1E',
            color: 'white',
          }}
        >
          <h1 style={{ fontSize: '2rem', marginBottom: '1rem', color: '#FF9500' }}>Something went wrong</h1>
          <p style={{ marginBottom: '2rem', color: '#d1d5db', textAlign: 'center', maxWidth: '600px' }}>
            The dashboard could not be rendered.
          </p>
          <button
            onClick={reset}
            style={{
              padding: '0.75rem 1.5rem',
              backgroundColor: '#007AFF',
              color: 'white',
              border: 'none',
              borderRadius: '0.5rem',
              cursor: 'pointer',
              fontSize: '1rem',
              fontWeight: '500',
            }}
          >
            Try again
          </button>
          {process.env.NODE_ENV === 'development' && (
            <pre style={{ marginTop: '2rem', maxWidth: '800px', width: '100%', overflow: 'auto', fontSize: '0.875rem' }}>
              {error.message}
              {error.digest && `\n\nDigest: ${error.digest}`}
            </pre>
          )}
        </div>
      </body>
    </html>
  );
}
