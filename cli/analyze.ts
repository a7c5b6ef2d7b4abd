/**
 * CLI Analyze Command - link-quality report from a receiver log
 */

import { readFileSync } from 'fs';
import { formatCodec } from '../src/utils/codes.js';
import { reconstructSessions, summarizeSession, type SessionSummary } from '../src/analysis/sessions.js';
import { formatSessionReport } from './report.js';
import { progressLog, withCoreLogsMuted } from './quiet.js';

export interface AnalyzeOptions {
  json?: boolean;
  quiet?: boolean;
}

export interface AnalyzeResult {
  sessions: (Omit<SessionSummary, 'codec'> & { codec: string; closed: boolean })[];
  observations: number;
  skipped: number;
  orphanCloses: number;
}

export function analyzeText(text: string, options: AnalyzeOptions): AnalyzeResult {
  const reconstruction = withCoreLogsMuted(options.quiet || options.json, () => reconstructSessions(text));
  const sessions = Array.from(reconstruction.sessions.values());

  const result: AnalyzeResult = {
    sessions: sessions.map(session => {
      const summary = summarizeSession(session);
      return { ...summary, codec: formatCodec(summary.codec), closed: session.state === 'closed' };
    }),
    observations: reconstruction.fragments.length,
    skipped: reconstruction.skipped,
    orphanCloses: reconstruction.orphanCloses,
  };

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  if (sessions.length === 0) {
    console.log('No sessions found in log.');
    return result;
  }

  console.log(`Found ${sessions.length} session(s).`);
  for (const session of sessions) {
    console.log('');
    for (const line of formatSessionReport(session, summarizeSession(session))) {
      console.log(line);
    }
  }

  return result;
}

export function analyzeCommand(file: string, options: AnalyzeOptions): AnalyzeResult {
  const log = progressLog(options.quiet || options.json);
  log(`Parsing log: ${file}`);
  return analyzeText(readFileSync(file, 'utf-8'), options);
}
