// frontend/src/components/DimensionBreakdown.tsx
import type { DimensionResult } from '../types/assessment';

interface DimensionBreakdownProps {
  result: DimensionResult;
}

/** Analysis, development focus and the individual statement ratings. */
export default function DimensionBreakdown({ result }: DimensionBreakdownProps) {
  return (
    <div className="space-y-4">
      <div className="flex items-baseline justify-between">
        <h3 className="text-lg font-semibold text-text-primary">{result.title}</h3>
        <span className="text-sm font-semibold text-primary">
          {result.total}/{result.maxTotal}
        </span>
      </div>
      <div>
        <h4 className="text-sm font-semibold text-text-secondary">Analysis</h4>
        <p className="text-sm text-text-primary mt-1">{result.interpretation}</p>
      </div>
      <div>
        <h4 className="text-sm font-semibold text-text-secondary">Development Focus</h4>
        <p className="text-sm text-text-primary mt-1">{result.development}</p>
      </div>
      <div>
        <h4 className="text-sm font-semibold text-text-secondary mb-2">Detailed Responses</h4>
        <ul className="divide-y divide-border rounded-md border border-border">
          {result.statements.map((statement) => (
            <li key={statement.statementId} className="flex justify-between gap-4 px-3 py-2 text-sm">
              <span className="text-text-primary">{statement.text}</span>
              <span className="font-semibold text-text-secondary whitespace-nowrap">
                {statement.rating === null ? 'Not answered' : `${statement.rating}/10`}
              </span>
            </li>
          ))}
        </ul>
      </div>
    </div>
  );
}
