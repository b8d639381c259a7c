#!/usr/bin/env tsx
/**
 * Run one reconciliation pass from the terminal.
 *
 * Fetches both calendars, prints the numbered candidates and waits for a
 * reply ("1,3", "all", "none" or "cancel") before writing anything.
 *
 * Options:
 *   --days <n>        Horizon in days (default: SYNC_HORIZON_DAYS)
 *   --target <name>   portal | google; repeat for both (default: portal)
 */

import { parseArgs } from 'node:util';
import { createInterface } from 'node:readline/promises';
import { z } from 'zod';
import { loadConfig } from '../config/env.js';
import { createLogger } from '../lib/logger.js';
import { createSyncContext } from '../lib/syncContext.js';
import { InvalidSelectionError } from '../lib/errors.js';
import { renderApprovalPrompt, renderRunReport } from '../utils/approvalRenderer.js';
import type { RunSyncOptions, SyncOrchestrator } from '../services/syncOrchestrator.js';
import type { RunReport } from '../types/sync.js';

const ArgsSchema = z.object({
  days: z.coerce.number().int().positive().optional(),
  target: z.array(z.enum(['portal', 'google'])).optional(),
});

export interface TerminalIo {
  ask(question: string): Promise<string>;
  print(text: string): void;
}

/**
 * One pass with the human answering on the terminal. Invalid replies are
 * re-asked; "cancel" abandons the request.
 *
 * @returns The run report, or null when nothing was applied
 */
export async function runTerminalSession(
  orchestrator: SyncOrchestrator,
  displayTimeZone: string,
  io: TerminalIo,
  options: RunSyncOptions = {}
): Promise<RunReport | null> {
  const pass = await orchestrator.runSync(options);
  if (pass.status === 'up_to_date') {
    io.print('Calendars are up to date; nothing to sync.');
    return null;
  }

  io.print(renderApprovalPrompt(pass.request, displayTimeZone));

  for (;;) {
    const answer = await io.ask('> ');
    if (answer.trim().toLowerCase() === 'cancel') {
      orchestrator.abandon('cancelled by user');
      io.print('Cancelled; nothing was written.');
      return null;
    }

    try {
      const report = await orchestrator.submitDecision(answer);
      io.print(renderRunReport(report));
      return report;
    } catch (error) {
      if (error instanceof InvalidSelectionError) {
        io.print(error.message);
        continue;
      }
      throw error;
    }
  }
}

async function main() {
  const { values } = parseArgs({
    options: {
      days: { type: 'string' },
      target: { type: 'string', multiple: true },
    },
  });

  const args = ArgsSchema.safeParse(values);
  if (!args.success) {
    console.error(`Invalid arguments: ${args.error.issues.map((issue) => issue.message).join('; ')}`);
    process.exit(1);
  }

  const cfg = loadConfig();
  const logger = createLogger(cfg);
  const { orchestrator, displayTimeZone } = createSyncContext(cfg, { logger });

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const report = await runTerminalSession(
      orchestrator,
      displayTimeZone,
      { ask: (question) => rl.question(question), print: (text) => console.log(text) },
      { horizonDays: args.data.days, targets: args.data.target }
    );
    if (report && report.counts.failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    rl.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
