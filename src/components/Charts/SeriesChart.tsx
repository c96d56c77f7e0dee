import { useEffect, useMemo, useRef } from 'react';
import { useAtomValue } from 'jotai';
import uPlot from 'uplot';
import 'uplot/dist/uPlot.min.css';
import Box from '@mui/material/Box';
import Card from '@mui/material/Card';
import CardContent from '@mui/material/CardContent';
import Chip from '@mui/material/Chip';
import Typography from '@mui/material/Typography';
import { useTheme } from '@mui/material/styles';
import {
  chartDisplayModeAtom,
  chartRevisionAtom,
  elapsedSecondsAtom,
  labelIntervalAtom,
  parameterInfoAtom,
  registryAtom,
  selectedChannelsAtom,
  timeWindowSecondsAtom,
  yAxisRangeAtom,
} from '../../store/atoms';
import type { StreamRegistry } from '../../utils/streamBuffers';
import { CHANNELS, type ChannelId } from './config/chartConfig';
import type { AxisRange } from './types';
import { buildTimeTicks, CHART_LAYOUT, formatElapsed, resolvePaletteColor } from './utils/chartUtils';
import { useThrottledAtomValue } from '../../hooks/useThrottledAtomValue';
import { CHART_REFRESH_INTERVAL } from '../../utils/constants';

/**
 * Plot data for the selected channels. Ticks are appended to every channel
 * under one timestamp, so the first channel's timestamps serve as the shared
 * x axis (seconds).
 */
export function buildPlotData(registry: StreamRegistry | null, channels: readonly ChannelId[]): uPlot.AlignedData {
  const snapshots = channels.map((c) => (registry ? registry.snapshot(c) : { values: [], timestamps: [] }));
  const xs = (snapshots[0]?.timestamps ?? []).map((ms) => ms / 1000);
  return [xs, ...snapshots.map((s) => s.values)];
}

/** Visible x range in seconds: the last `windowSeconds`, starting at 0 until the window fills */
export function visibleXRange(xs: ArrayLike<number>, windowSeconds: number): AxisRange {
  const last = xs.length > 0 ? xs[xs.length - 1] : 0;
  const max = Math.max(last, windowSeconds);
  return { min: max - windowSeconds, max };
}

/**
 * Streaming chart of the selected parameter, single series or X/Y/Z.
 * Ticks bump chartRevision at the sampling rate; the chart samples it (and
 * the auto range it drags along) every CHART_REFRESH_INTERVAL ms. The plot
 * itself is only rebuilt when the series set or label interval changes.
 */
export function SeriesChart() {
  const theme = useTheme();
  const registry = useAtomValue(registryAtom);
  const revision = useThrottledAtomValue(chartRevisionAtom, CHART_REFRESH_INTERVAL);
  const channels = useAtomValue(selectedChannelsAtom);
  const info = useAtomValue(parameterInfoAtom);
  const mode = useAtomValue(chartDisplayModeAtom);
  const yRange = useThrottledAtomValue(yAxisRangeAtom, CHART_REFRESH_INTERVAL);
  const windowSeconds = useAtomValue(timeWindowSecondsAtom);
  const labelInterval = useAtomValue(labelIntervalAtom);
  const elapsed = useThrottledAtomValue(elapsedSecondsAtom, CHART_REFRESH_INTERVAL);

  const containerRef = useRef<HTMLDivElement>(null);
  const plotRef = useRef<uPlot | null>(null);

  // Scale range callbacks read these so a redraw never snaps back to data bounds
  const xRangeRef = useRef<AxisRange>({ min: 0, max: windowSeconds });
  const yRangeRef = useRef<AxisRange>(yRange);

  const options = useMemo<uPlot.Options>(() => {
    const axisGrid = { show: true, stroke: theme.palette.divider, width: 1 };
    return {
      width: containerRef.current?.clientWidth || 800,
      height: CHART_LAYOUT.height,
      scales: {
        x: {
          time: false,
          auto: false,
          range: () => [xRangeRef.current.min, xRangeRef.current.max],
        },
        y: {
          auto: false,
          range: () => [yRangeRef.current.min, yRangeRef.current.max],
        },
      },
      series: [
        { label: 'Time' },
        ...channels.map((channel) => {
          const config = CHANNELS[channel];
          return {
            label: config.label,
            stroke: resolvePaletteColor(theme, config.color),
            width: 1.5,
            points: { show: false },
            value: (_u: uPlot, v: number | null) =>
              v == null || Number.isNaN(v) ? '--' : `${v.toFixed(config.decimals)} ${config.unit}`,
          };
        }),
      ],
      axes: [
        {
          grid: axisGrid,
          splits: (_u, _axisIdx, min, max) =>
            buildTimeTicks(min * 1000, max * 1000, labelInterval).map((ms) => ms / 1000),
          values: (_u, vals) => vals.map((v) => formatElapsed(v * 1000)),
        },
        {
          scale: 'y',
          grid: axisGrid,
          size: CHART_LAYOUT.yAxis.width,
        },
      ],
      legend: { show: mode === 'multi' },
    };
  }, [theme, channels, labelInterval, mode]);

  // Rebuilt only when options change; data is pushed by the effect below
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;
    const plot = new uPlot(options, buildPlotData(registry, channels), container);
    plotRef.current = plot;

    const ro = new ResizeObserver((entries) => {
      const width = entries[0]?.contentRect.width;
      if (width && plotRef.current) {
        plotRef.current.setSize({ width: Math.round(width), height: CHART_LAYOUT.height });
      }
    });
    ro.observe(container);
    return () => {
      ro.disconnect();
      plot.destroy();
      plotRef.current = null;
    };
  }, [options]);

  // Redraw on a sampled revision, axis or window change
  useEffect(() => {
    const plot = plotRef.current;
    if (!plot) return;

    const data = buildPlotData(registry, channels);
    xRangeRef.current = visibleXRange(data[0], windowSeconds);
    yRangeRef.current = yRange;

    plot.setData(data, false);
    plot.setScale('x', { min: xRangeRef.current.min, max: xRangeRef.current.max });
    plot.setScale('y', { min: yRange.min, max: yRange.max });
  }, [revision, registry, channels, yRange, windowSeconds, options]);

  const hasData = channels.length > 0 && registry !== null && registry.length(channels[0]) > 0;

  let latestText = '--';
  if (mode === 'single' && registry && channels.length === 1) {
    const latest = registry.latest(channels[0]);
    const config = CHANNELS[channels[0]];
    if (latest !== null) latestText = `${latest.toFixed(config.decimals)} ${config.unit}`;
  }

  return (
    <Card>
      <CardContent>
        <Box display="flex" justifyContent="space-between" alignItems="center" mb={1} gap={1}>
          <Typography variant="subtitle1">{info?.title ?? 'No parameter selected'}</Typography>
          <Box display="flex" gap={1}>
            <Chip size="small" label={`t = ${formatElapsed(elapsed * 1000)}`} variant="outlined" />
            {mode === 'single' && (
              <Chip size="small" label={latestText} sx={{ bgcolor: theme.palette.action.hover }} />
            )}
          </Box>
        </Box>
        <Box sx={{ width: '100%', height: CHART_LAYOUT.height + (mode === 'multi' ? 40 : 10), position: 'relative' }}>
          <Box ref={containerRef} sx={{ width: '100%', height: '100%' }} />
          {!hasData && (
            <Box
              sx={{
                position: 'absolute',
                top: '50%',
                left: '50%',
                transform: 'translate(-50%, -50%)',
                color: 'text.disabled',
                fontSize: '0.875rem',
                pointerEvents: 'none',
              }}
            >
              Waiting for samples…
            </Box>
          )}
        </Box>
        {info && (
          <Typography variant="caption" color="text.secondary">
            {info.label} [{info.unit}]
          </Typography>
        )}
      </CardContent>
    </Card>
  );
}
