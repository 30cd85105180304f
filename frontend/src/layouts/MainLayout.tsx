// frontend/src/layouts/MainLayout.tsx
import type { ReactNode } from 'react';
import ToastContainer from '../components/ToastContainer';

export default function MainLayout({ children }: { children: ReactNode }) {
  return (
    <div className="min-h-screen bg-bg-medium">
      <header className="bg-bg-light border-b border-border">
        <div className="mx-auto max-w-4xl px-6 py-4">
          <h1 className="text-lg font-bold text-text-primary">Leadership Self-Assessment</h1>
        </div>
      </header>
      <main className="mx-auto max-w-4xl px-6 py-8">{children}</main>
      <ToastContainer />
    </div>
  );
}
