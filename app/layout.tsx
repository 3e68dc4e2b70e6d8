import './globals.css';
import type { Metadata } from 'next';
import { ErrorBoundary } from '@/components/ErrorBoundary';
import { SentryClientInit } from '@/components/SentryClientInit';

export const metadata: Metadata = {
  title: 'Medical Appointment Dashboard',
  description: 'No-show analysis of medical appointments',
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body className="bg-paper text-white font-sans">
        <ErrorBoundary>
          <SentryClientInit />
          {children}
        </ErrorBoundary>
      </body>
    </html>
  );
}
