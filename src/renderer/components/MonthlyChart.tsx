import { useMemo } from 'react';
import { formatMonthLabel } from '../format';

type Point = {
  month: string;
  value: number;
};

type Props = {
  title: string;
  points: Point[];
  variant: 'bar' | 'line';
  format?: (value: number) => string;
};

const WIDTH = 640;
const HEIGHT = 220;
const PADDING = { top: 16, right: 16, bottom: 36, left: 44 };

export default function MonthlyChart({ title, points, variant, format = (value) => String(value) }: Props) {
  const layout = useMemo(() => {
    const max = Math.max(1, ...points.map((point) => point.value));
    const innerWidth = WIDTH - PADDING.left - PADDING.right;
    const innerHeight = HEIGHT - PADDING.top - PADDING.bottom;
    const slot = points.length ? innerWidth / points.length : innerWidth;
    const y = (value: number) => PADDING.top + innerHeight - (value / max) * innerHeight;
    const x = (index: number) => PADDING.left + slot * index + slot / 2;
    return { max, slot, x, y, baseline: PADDING.top + innerHeight };
  }, [points]);

  const linePath = points.map((point, index) => `${index === 0 ? 'M' : 'L'}${layout.x(index)},${layout.y(point.value)}`).join(' ');

  return (
    <figure className="card chart">
      <figcaption className="label">{title}</figcaption>
      <svg viewBox={`0 0 ${WIDTH} ${HEIGHT}`} role="img" aria-label={title}>
        <line x1={PADDING.left} x2={WIDTH - PADDING.right} y1={layout.baseline} y2={layout.baseline} className="chart-axis" />
        <text x={PADDING.left - 6} y={layout.y(layout.max)} textAnchor="end" className="chart-tick">{format(layout.max)}</text>
        <text x={PADDING.left - 6} y={layout.baseline} textAnchor="end" className="chart-tick">0</text>
        {variant === 'bar'
          ? points.map((point, index) => (
              <rect
                key={point.month}
                x={layout.x(index) - layout.slot * 0.35}
                width={layout.slot * 0.7}
                y={layout.y(point.value)}
                height={layout.baseline - layout.y(point.value)}
                className="chart-bar"
              >
                <title>{`${formatMonthLabel(point.month)}: ${format(point.value)}`}</title>
              </rect>
            ))
          : (
            <>
              <path d={linePath} className="chart-line" fill="none" />
              {points.map((point, index) => (
                <circle key={point.month} cx={layout.x(index)} cy={layout.y(point.value)} r={3.5} className="chart-dot">
                  <title>{`${formatMonthLabel(point.month)}: ${format(point.value)}`}</title>
                </circle>
              ))}
            </>
          )}
        {points.map((point, index) => (
          <text key={point.month} x={layout.x(index)} y={HEIGHT - 12} textAnchor="middle" className="chart-tick">
            {formatMonthLabel(point.month)}
          </text>
        ))}
      </svg>
    </figure>
  );
}
