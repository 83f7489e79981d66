/**
 * Report stores
 *
 * Append-only: a step report is written once and a second write for the
 * same step index of a run is rejected.
 *
 * Layout of the file store:
 *
 *   <reportsDir>/<YYYY-MM-DD>/<runId>/step_NN_<stepId>.md
 *                                     synthesis.md
 *                                     results.json
 *
 * @module workflow
 */

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { StoreError } from '../errors/index.js';
import type { Report, WorkflowRun } from '../types/core-types.js';
import { renderResults, renderStepReport, renderSynthesis, stepFileName } from './ReportRenderer.js';

export const SYNTHESIS_FILE = 'synthesis.md';
export const RESULTS_FILE = 'results.json';

export interface StoredRun {
  runId: string;
  /** YYYY-MM-DD the run started */
  date: string;
  files: string[];
}

export interface ReportStore {
  /**
   * @throws {StoreError} when a report with the same step index exists
   */
  writeReport(run: WorkflowRun, report: Report): Promise<void>;
  writeResults(run: WorkflowRun): Promise<void>;
  /** Newest first */
  listRuns(): Promise<StoredRun[]>;
  readFile(runId: string, name: string): Promise<string | undefined>;
}

function fileNameFor(report: Report): string {
  return report.kind === 'step' ? stepFileName(report) : SYNTHESIS_FILE;
}

function render(report: Report, run: WorkflowRun): string {
  return report.kind === 'step' ? renderStepReport(report, run) : renderSynthesis(report, run);
}

function runDate(run: WorkflowRun): string {
  return run.startedAt.slice(0, 10);
}

export class FileReportStore implements ReportStore {
  private readonly written = new Map<string, Set<number>>();

  constructor(private readonly dir: string) {}

  async writeReport(run: WorkflowRun, report: Report): Promise<void> {
    const indices = this.written.get(run.id) ?? new Set<number>();
    if (indices.has(report.stepIndex)) {
      throw StoreError.reportConflict(run.id, report.stepIndex);
    }
    indices.add(report.stepIndex);
    this.written.set(run.id, indices);

    await this.writeOnce(run, fileNameFor(report), render(report, run), report.stepIndex);
  }

  async writeResults(run: WorkflowRun): Promise<void> {
    await this.writeOnce(run, RESULTS_FILE, renderResults(run), run.stepReports.length + 2);
    this.written.delete(run.id);
  }

  async listRuns(): Promise<StoredRun[]> {
    const runs: StoredRun[] = [];
    for (const date of await listEntries(this.dir, 'directory')) {
      for (const runId of await listEntries(join(this.dir, date), 'directory')) {
        runs.push({ runId, date, files: (await listEntries(join(this.dir, date, runId), 'file')).sort() });
      }
    }
    return runs.sort((a, b) => b.date.localeCompare(a.date) || a.runId.localeCompare(b.runId));
  }

  async readFile(runId: string, name: string): Promise<string | undefined> {
    const run = (await this.listRuns()).find((candidate) => candidate.runId === runId);
    if (!run || !run.files.includes(name)) {
      return undefined;
    }
    return readFile(join(this.dir, run.date, runId, name), 'utf-8');
  }

  runDir(run: WorkflowRun): string {
    return join(this.dir, runDate(run), run.id);
  }

  private async writeOnce(run: WorkflowRun, name: string, content: string, stepIndex: number): Promise<void> {
    const folder = this.runDir(run);
    await mkdir(folder, { recursive: true });
    try {
      await writeFile(join(folder, name), content, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (isAlreadyExists(error)) {
        throw StoreError.reportConflict(run.id, stepIndex);
      }
      throw error;
    }
  }
}

export class InMemoryReportStore implements ReportStore {
  private readonly runs = new Map<string, { date: string; files: Map<string, string>; indices: Set<number> }>();

  async writeReport(run: WorkflowRun, report: Report): Promise<void> {
    const entry = this.entryFor(run);
    if (entry.indices.has(report.stepIndex)) {
      throw StoreError.reportConflict(run.id, report.stepIndex);
    }
    entry.indices.add(report.stepIndex);
    entry.files.set(fileNameFor(report), render(report, run));
  }

  async writeResults(run: WorkflowRun): Promise<void> {
    this.entryFor(run).files.set(RESULTS_FILE, renderResults(run));
  }

  async listRuns(): Promise<StoredRun[]> {
    return [...this.runs.entries()]
      .map(([runId, entry]) => ({ runId, date: entry.date, files: [...entry.files.keys()].sort() }))
      .sort((a, b) => b.date.localeCompare(a.date) || a.runId.localeCompare(b.runId));
  }

  async readFile(runId: string, name: string): Promise<string | undefined> {
    return this.runs.get(runId)?.files.get(name);
  }

  private entryFor(run: WorkflowRun) {
    let entry = this.runs.get(run.id);
    if (!entry) {
      entry = { date: runDate(run), files: new Map(), indices: new Set() };
      this.runs.set(run.id, entry);
    }
    return entry;
  }
}

async function listEntries(dir: string, kind: 'file' | 'directory'): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => (kind === 'file' ? entry.isFile() : entry.isDirectory()))
      .map((entry) => entry.name);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}
