// frontend/tailwind.config.ts
import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        primary: { DEFAULT: '#068c81', hover: '#05756c', active: '#045f58' },
        success: '#16a34a',
        error: '#dc2626',
        warning: '#f59e0b',
        info: '#3b82f6',
        border: '#e5e7eb',
        'bg-light': '#ffffff',
        'bg-medium': '#f3f4f6',
        'text-primary': '#111827',
        'text-secondary': '#4b5563',
        'text-muted': '#9ca3af',
      },
    },
  },
  plugins: [],
} satisfies Config;
