// frontend/src/components/ScoreBar.tsx
import type { InterpretationBand } from '../types/assessment';

const BAND_COLORS: Record<InterpretationBand, string> = {
  high: 'bg-success',
  medium_high: 'bg-primary',
  medium: 'bg-info',
  medium_low: 'bg-warning',
  low: 'bg-error',
};

interface ScoreBarProps {
  title: string;
  total: number;
  maxTotal: number;
  band: InterpretationBand;
}

export default function ScoreBar({ title, total, maxTotal, band }: ScoreBarProps) {
  const percent = maxTotal > 0 ? Math.round((total / maxTotal) * 100) : 0;

  return (
    <div>
      <div className="flex justify-between text-sm mb-1">
        <span className="font-medium text-text-primary">{title}</span>
        <span className="text-text-secondary">
          {total}/{maxTotal}
        </span>
      </div>
      <div className="h-2.5 w-full rounded-full bg-bg-medium">
        <div className={`h-2.5 rounded-full ${BAND_COLORS[band]}`} style={{ width: `${percent}%` }} />
      </div>
    </div>
  );
}
