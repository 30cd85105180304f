// frontend/src/components/ToastContainer.tsx
import { useToastStore, type ToastType } from '../state/toastStore';

const TOAST_STYLES: Record<ToastType, { title: string; bg: string; symbol: string }> = {
  success: { title: 'Saved', bg: 'bg-success', symbol: '✓' },
  error: { title: 'Something went wrong', bg: 'bg-error', symbol: '!' },
  info: { title: 'Notice', bg: 'bg-info', symbol: 'i' },
};

export default function ToastContainer() {
  const { toasts, removeToast } = useToastStore();

  return (
    <div className="fixed bottom-4 right-4 z-50 w-full max-w-sm space-y-3" role="status">
      {toasts.map((toast) => {
        const { title, bg, symbol } = TOAST_STYLES[toast.type];
        return (
          <div
            key={toast.id}
            className="w-full rounded-lg shadow-lg bg-bg-light p-4 flex items-start gap-3 border border-border"
          >
            <div
              className={`w-6 h-6 ${bg} text-white text-xs font-bold rounded-full flex items-center justify-center flex-shrink-0 mt-0.5`}
            >
              {symbol}
            </div>
            <div className="flex-grow">
              <h4 className="text-sm font-semibold text-text-primary">{title}</h4>
              <p className="text-sm text-text-secondary mt-1">{toast.message}</p>
            </div>
            <button
              onClick={() => removeToast(toast.id)}
              className="text-text-muted hover:text-text-primary flex-shrink-0"
              aria-label="Dismiss"
            >
              &times;
            </button>
          </div>
        );
      })}
    </div>
  );
}
