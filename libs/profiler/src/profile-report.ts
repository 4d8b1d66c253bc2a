/**
 * Profile Report
 *
 * Point-in-time report of a profile session, checked against optional
 * thresholds and rendered as text, JSON or CSV.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';
import { PerformanceThresholdsSchema, parseArgument } from '@dispatch-perf/types';
import type { OperationMetrics } from '@dispatch-perf/types';
import type { ProfileSession } from './session';
import { formatBytes, formatDuration } from './statistics';

export type PerformanceThresholds = z.infer<typeof PerformanceThresholdsSchema>;

/**
 * Profile Report
 *
 * Figures are captured when the report is built, so every renderer describes
 * the same moment even if the session keeps recording.
 */
export class ProfileReport {
  readonly session: ProfileSession;
  readonly thresholds: Readonly<PerformanceThresholds>;
  readonly generatedAt: number;
  readonly sessionDuration: number;
  readonly totalMemoryUsed: number;
  readonly totalAllocations: number;
  readonly averageOperationDuration: number;
  readonly operations: readonly OperationMetrics[];
  readonly warnings: readonly string[];

  /**
   * @throws ArgumentError (parameter `thresholds`) for non-finite limits
   */
  constructor(session: ProfileSession, thresholds: PerformanceThresholds = {}) {
    this.session = session;
    this.thresholds = Object.freeze(parseArgument(PerformanceThresholdsSchema, thresholds, 'thresholds'));
    this.generatedAt = Date.now();
    this.sessionDuration = session.duration;
    this.totalMemoryUsed = session.totalMemoryUsed;
    this.totalAllocations = session.totalAllocations;
    this.averageOperationDuration = session.averageOperationDuration;
    this.operations = Object.freeze([...session.operations]);
    this.warnings = Object.freeze(this.collectWarnings());
  }

  private collectWarnings(): string[] {
    const { maxDuration, maxMemory, maxAllocations, maxOperationDuration, maxOperationMemory } = this.thresholds;
    const warnings: string[] = [];

    if (maxDuration !== undefined && this.sessionDuration > maxDuration) {
      warnings.push(
        `Session duration ${formatDuration(this.sessionDuration)} exceeds threshold ${formatDuration(maxDuration)}`,
      );
    }
    if (maxMemory !== undefined && this.totalMemoryUsed > maxMemory) {
      warnings.push(
        `Total memory usage ${formatBytes(this.totalMemoryUsed)} exceeds threshold ${formatBytes(maxMemory)}`,
      );
    }
    if (maxAllocations !== undefined && this.totalAllocations > maxAllocations) {
      warnings.push(`Total allocations ${this.totalAllocations} exceeds threshold ${maxAllocations}`);
    }

    for (const operation of this.operations) {
      if (maxOperationDuration !== undefined && operation.duration > maxOperationDuration) {
        warnings.push(
          `Operation '${operation.name}' duration ${formatDuration(operation.duration)} exceeds threshold ${formatDuration(maxOperationDuration)}`,
        );
      }
      if (maxOperationMemory !== undefined && operation.memoryUsed > maxOperationMemory) {
        warnings.push(
          `Operation '${operation.name}' memory usage ${formatBytes(operation.memoryUsed)} exceeds threshold ${formatBytes(maxOperationMemory)}`,
        );
      }
    }

    return warnings;
  }

  /**
   * Human-readable text
   */
  toConsole(): string {
    const lines: string[] = [
      `=== Performance Profile Report: ${this.session.sessionName} ===`,
      '',
      `Session Duration: ${formatDuration(this.sessionDuration)}`,
      `Total Memory Used: ${formatBytes(this.totalMemoryUsed)}`,
      `Total Allocations: ${this.totalAllocations}`,
      `Operations Count: ${this.operations.length}`,
      `Average Operation Duration: ${formatDuration(this.averageOperationDuration)}`,
    ];

    if (this.operations.length > 0) {
      lines.push('', 'Operations:');
      for (const operation of this.operations) {
        lines.push(
          `  ${operation.name}: ${formatDuration(operation.duration)}, ${formatBytes(operation.memoryUsed)}, ${operation.allocations} allocations`,
        );
      }
    }

    if (this.warnings.length > 0) {
      lines.push('', 'Warnings:');
      for (const warning of this.warnings) {
        lines.push(`  - ${warning}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Indented JSON document
   */
  toJson(): string {
    return JSON.stringify(
      {
        SessionName: this.session.sessionName,
        GeneratedAt: new Date(this.generatedAt).toISOString(),
        DurationMs: this.sessionDuration,
        TotalMemoryUsed: this.totalMemoryUsed,
        TotalAllocations: this.totalAllocations,
        AverageOperationDurationMs: this.averageOperationDuration,
        Operations: this.operations.map((operation) => ({
          Name: operation.name,
          DurationMs: operation.duration,
          MemoryUsed: operation.memoryUsed,
          Allocations: operation.allocations,
        })),
        Warnings: this.warnings,
      },
      null,
      2,
    );
  }

  /**
   * CSV with a summary section, an operations section and, when present, warnings
   */
  toCsv(): string {
    const rows: string[][] = [
      ['Session Summary'],
      ['Name', 'DurationMs', 'TotalMemoryUsed', 'TotalAllocations', 'OperationsCount', 'AverageOperationDurationMs'],
      [
        this.session.sessionName,
        String(this.sessionDuration),
        String(this.totalMemoryUsed),
        String(this.totalAllocations),
        String(this.operations.length),
        String(this.averageOperationDuration),
      ],
      [],
      ['Operations'],
      ['Name', 'DurationMs', 'MemoryUsed', 'Allocations'],
      ...this.operations.map((operation) => [
        operation.name,
        String(operation.duration),
        String(operation.memoryUsed),
        String(operation.allocations),
      ]),
    ];

    if (this.warnings.length > 0) {
      rows.push([], ['Warnings'], ...this.warnings.map((warning) => [warning]));
    }

    return rows.map((row) => row.map(escapeCsv).join(',')).join('\n');
  }
}

/**
 * Quote a CSV field containing a comma, quote or line break
 */
export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
