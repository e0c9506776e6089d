/**
 * ForecastChart Component
 * Day chart for one city: both feeds, their average and the band between them,
 * rain probabilities on a right-hand axis, static temperature zones underneath.
 */

import {
  Area,
  ComposedChart,
  Line,
  ReferenceArea,
  ReferenceDot,
  XAxis,
  YAxis
} from 'recharts';
import { CHART_COLORS, type ChartModel } from './model';

interface ForecastChartProps {
  model: ChartModel;
}

export function ForecastChart({ model }: ForecastChartProps) {
  return (
    <ComposedChart
      id={`forecast-${model.date}`}
      width={model.width}
      height={model.height}
      data={model.rows}
      margin={{ top: 28, right: 8, left: 0, bottom: 8 }}
    >
      <XAxis
        dataKey="label"
        stroke="#444444"
        tickLine={false}
      />
      <YAxis
        yAxisId="temp"
        domain={model.tempDomain}
        allowDataOverflow
        stroke={CHART_COLORS.primaryTemp}
        tickFormatter={(value: number) => `${value}°`}
        width={44}
      />
      <YAxis
        yAxisId="rain"
        orientation="right"
        domain={[0, 100]}
        stroke={CHART_COLORS.secondaryRain}
        tickFormatter={(value: number) => `${value}%`}
        width={44}
      />

      {/* Zones first so the band stays on top */}
      {model.zones.map((zone) => (
        <ReferenceArea
          key={zone.id}
          yAxisId="temp"
          y1={zone.fromC}
          y2={zone.toC}
          fill={zone.fill}
          fillOpacity={0.2}
          stroke="none"
          ifOverflow="hidden"
        />
      ))}

      <Area
        yAxisId="temp"
        type="linear"
        dataKey="band"
        stroke="none"
        fill={CHART_COLORS.band}
        fillOpacity={0.35}
        isAnimationActive={false}
      />

      <Line
        yAxisId="temp"
        type="linear"
        dataKey="primaryTemp"
        stroke={CHART_COLORS.primaryTemp}
        strokeWidth={2}
        dot={{ r: 3 }}
        isAnimationActive={false}
      />
      <Line
        yAxisId="temp"
        type="linear"
        dataKey="secondaryTemp"
        stroke={CHART_COLORS.secondaryTemp}
        strokeWidth={2}
        strokeDasharray="6 4"
        dot={{ r: 3 }}
        isAnimationActive={false}
      />
      <Line
        yAxisId="temp"
        type="linear"
        dataKey="avgTemp"
        stroke={CHART_COLORS.avgTemp}
        strokeWidth={2}
        strokeDasharray="2 3"
        dot={{ r: 3 }}
        connectNulls
        isAnimationActive={false}
      />

      <Line
        yAxisId="rain"
        type="linear"
        dataKey="primaryRain"
        stroke={CHART_COLORS.primaryRain}
        strokeWidth={1.5}
        strokeDasharray="8 3 2 3"
        dot={{ r: 2 }}
        isAnimationActive={false}
      />
      <Line
        yAxisId="rain"
        type="linear"
        dataKey="secondaryRain"
        stroke={CHART_COLORS.secondaryRain}
        strokeWidth={1.5}
        strokeDasharray="2 3"
        dot={{ r: 2 }}
        isAnimationActive={false}
      />

      {model.annotations.map((annotation) => (
        <ReferenceDot
          key={annotation.label}
          yAxisId="temp"
          x={annotation.label}
          y={annotation.value}
          r={3}
          fill={CHART_COLORS.avgTemp}
          stroke="none"
          label={{
            value: annotation.text,
            position: 'top',
            fontSize: 14,
            fontWeight: 'bold',
            fill: CHART_COLORS.avgTemp
          }}
        />
      ))}
    </ComposedChart>
  );
}
