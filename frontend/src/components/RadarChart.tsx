// frontend/src/components/RadarChart.tsx
import { useEffect, useRef } from 'react';
import { Chart, RadarController, RadialLinearScale, PointElement, LineElement, Filler, Tooltip } from 'chart.js';
import type { DimensionResult } from '../types/assessment';

Chart.register(RadarController, RadialLinearScale, PointElement, LineElement, Filler, Tooltip);

Chart.defaults.font.family = 'Inter, sans-serif';
Chart.defaults.color = '#4b5563';

interface RadarChartProps {
  results: DimensionResult[];
}

/** One spoke per dimension, scaled to the dimension maximum. */
export default function RadarChart({ results }: RadarChartProps) {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    if (!canvasRef.current) return;
    const max = results.reduce((highest, r) => Math.max(highest, r.maxTotal), 0);

    const chart = new Chart(canvasRef.current, {
      type: 'radar',
      data: {
        labels: results.map((r) => r.title),
        datasets: [
          {
            label: 'Score',
            data: results.map((r) => r.total),
            borderColor: '#068c81',
            backgroundColor: 'rgba(6, 140, 129, 0.2)',
            pointBackgroundColor: '#068c81',
            fill: true,
          },
        ],
      },
      options: {
        responsive: true,
        maintainAspectRatio: false,
        plugins: { legend: { display: false } },
        scales: { r: { min: 0, max, ticks: { stepSize: 10 }, grid: { color: '#e5e7eb' } } },
      },
    });

    return () => {
      chart.destroy();
    };
  }, [results]);

  return (
    <div className="relative h-80 w-full">
      <canvas ref={canvasRef} aria-label="Leadership dimensions radar chart" />
    </div>
  );
}
