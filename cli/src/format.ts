/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | boolean | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('—') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(22))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.log(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function statusColor(status: string): string {
  const s = status.toLowerCase();
  if (s === 'active' || s === 'closed') return chalk.green(status);
  if (s === 'approved' || s === 'half_open') return chalk.blue(status);
  if (s === 'pending') return chalk.yellow(status);
  if (s === 'rejected' || s === 'open') return chalk.red(status);
  return status;
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/** 1500 → "1.5s", 125000 → "2m 5s", 7260000 → "2h 1m" */
export function formatDuration(ms: number | null): string {
  if (ms === null) return 'never';
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ${seconds % 60}s`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

export function formatDate(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export interface BatchCounts {
  processed: number;
  approved: number;
  rejected: number;
  retried: number;
  failed: number;
}

export function batchSummary(result: BatchCounts): string {
  return `${result.processed} processed: ${result.approved} approved, ${result.rejected} rejected, ${result.retried} retried, ${result.failed} failed`;
}
