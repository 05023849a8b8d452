import { mkdir, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { PageResult } from '../orchestrator/types.js';
import type { CrawlReport } from './types.js';

const PREVIEW_LENGTH = 500;

type PageResultJson = Omit<PageResult, 'content'> & {
  preview: string | null;
};

type CrawlReportJson = Omit<CrawlReport, 'results'> & {
  results: PageResultJson[];
};

/** Report as printed or saved: page contents cut down to a preview. */
export function toReportJson(report: CrawlReport): CrawlReportJson {
  return {
    ...report,
    results: report.results.map(({ content, ...result }) => ({
      ...result,
      preview: content === null ? null : content.slice(0, PREVIEW_LENGTH),
    })),
  };
}

export function formatReport(report: CrawlReport, pretty: boolean): string {
  const json = toReportJson(report);
  return pretty ? JSON.stringify(json, null, 2) : JSON.stringify(json);
}

export async function writeReport(
  outputPath: string,
  report: CrawlReport,
  pretty: boolean,
): Promise<void> {
  const tmpPath = `${outputPath}.tmp`;
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(tmpPath, `${formatReport(report, pretty)}\n`, 'utf-8');
  await rename(tmpPath, outputPath);
}

export { PREVIEW_LENGTH };
export type { CrawlReportJson, PageResultJson };
