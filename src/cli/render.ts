import chalk from 'chalk';
import Table from 'cli-table3';
import type { LatencyHeatmapReport, TargetStatisticsPayload } from '../types/heatmap.types.js';

function colorLoss(packetLoss: number): string {
  const text = `${packetLoss.toFixed(2)}%`;
  if (packetLoss === 0) return chalk.green(text);
  if (packetLoss < 100) return chalk.yellow(text);
  return chalk.red(text);
}

function formatMs(value: number, stat: TargetStatisticsPayload): string {
  return stat.packetLoss === 100 ? chalk.gray('-') : value.toFixed(2);
}

export function renderStatisticsTable(report: LatencyHeatmapReport): string {
  const table = new Table({
    head: ['Target', 'Min (ms)', 'Avg (ms)', 'Median (ms)', 'Max (ms)', 'Jitter (ms)', 'Loss', 'Rounds'],
    style: { head: ['cyan'] }
  });

  for (const stat of report.statistics) {
    table.push([
      stat.target,
      formatMs(stat.minRtt, stat),
      formatMs(stat.avgRtt, stat),
      formatMs(stat.medianRtt, stat),
      formatMs(stat.maxRtt, stat),
      formatMs(stat.jitter, stat),
      colorLoss(stat.packetLoss),
      String(stat.rtts.length)
    ]);
  }

  return table.toString();
}

export function renderSummary(report: LatencyHeatmapReport): string {
  const { heatmapData } = report;
  return chalk.gray(
    `${report.statistics.length}/${report.targets.length} targets | ` +
    `${heatmapData.timestamps.length} rounds on the timeline | ` +
    `scale ${heatmapData.minLatency} to ${heatmapData.maxLatency} ms | completed ${report.timestamp}`
  );
}
