#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { z } from 'zod';
import { createContext } from './core/context.js';
import { carryOver, runTurn, type CarryOver } from './core/pipeline.js';
import { DomainDecision, LengthStyle, ScriptOutput, Segment, type TurnT } from './schemas/ideation.js';
import { createLogger } from './util/logging.js';
import { toStdError } from './util/errors.js';

const rl = readline.createInterface({ input, output });
const log = createLogger();

type Styler = (value: string) => string;

interface BlockParts {
  top: string;
  body: string;
  bottom: string;
}

const FRAME_BAR = '─'.repeat(44);

function createBlock(title: string, content: string, frame: Styler, body: Styler): BlockParts {
  const top = frame(`┌─ ${title} ${FRAME_BAR}`);
  const lines = content.length > 0 ? content.split('\n').map((line) => `${frame('│')} ${body(line)}`) : [];
  const bottom = frame(`└${'─'.repeat(title.length + FRAME_BAR.length + 3)}`);
  return { top, body: lines.join('\n'), bottom };
}

type Session = {
  turns: TurnT[];
  segment?: z.infer<typeof Segment>;
  allowZeroShot: boolean;
  carried?: CarryOver;
};

function freshSession(): Session {
  return { turns: [], allowZeroShot: false };
}

const TrimmedOutputs = z.object({
  domain: DomainDecision.optional(),
  script: ScriptOutput.optional(),
});

function renderReply(outputs: unknown): { text: string; meta: string } {
  const parsed = TrimmedOutputs.safeParse(outputs);
  if (!parsed.success) return { text: '', meta: '' };
  const { domain, script } = parsed.data;
  const meta = domain
    ? `segment=${domain.segment ?? '-'} via=${domain.via} conf=${domain.confidence.toFixed(2)} topic=${domain.onTopicScore}`
    : '';
  if (!script) return { text: '', meta };
  switch (script.mode) {
    case 'ask':
      return { text: `[${script.section}] ${script.question}`, meta };
    case 'notice':
    case 'end':
      return { text: script.message, meta };
  }
}

/**
 * Slash commands. Returns true when the line was a command.
 */
function handleCommand(line: string, session: Session): boolean {
  const [cmd, arg = ''] = line.trim().split(/\s+/, 2);
  switch (cmd) {
    case '/segment': {
      const seg = Segment.safeParse(arg);
      if (seg.success) {
        session.segment = seg.data;
        console.log(chalk.gray(`segment → ${seg.data}`));
      } else {
        session.segment = undefined;
        console.log(chalk.gray('segment override cleared'));
      }
      return true;
    }
    case '/style': {
      const style = LengthStyle.safeParse(arg);
      if (!style.success) {
        console.log(chalk.red(`unknown style: ${arg} (one_line | short | medium | long)`));
        return true;
      }
      session.carried = { ...(session.carried ?? {}), lengthStyle: style.data };
      console.log(chalk.gray(`style → ${style.data}`));
      return true;
    }
    case '/zeroshot':
      session.allowZeroShot = arg === 'on';
      console.log(chalk.gray(`zero-shot ${session.allowZeroShot ? 'on' : 'off'}`));
      return true;
    case '/reset':
      Object.assign(session, freshSession());
      console.log(chalk.gray('session reset'));
      return true;
    default:
      return false;
  }
}

async function main() {
  log.debug({ logLevel: process.env.LOG_LEVEL || 'info' }, 'cli_start');

  console.log(chalk.yellow.bold('🏕️  Travel & Leisure Business Ideation — interview CLI'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(
    chalk.white(
      chalk.green('Answer each question about your travel/leisure business idea.\n') +
        chalk.blue('Commands: /segment <camping|experience|sports>, /style <one_line|short|medium|long>,\n') +
        chalk.blue('          /zeroshot on|off, /reset\n') +
        chalk.red('exit (quit)'),
    ),
  );
  console.log(chalk.gray('─'.repeat(60)));
  console.log();

  const session = freshSession();

  while (true) {
    const q = await rl.question(chalk.blue.bold('You> '));
    if (q.trim().toLowerCase() === 'exit') break;
    if (q.trim().startsWith('/') && handleCommand(q, session)) continue;

    session.turns.push({ role: 'user', content: q });
    const ctx = createContext({
      turns: session.turns,
      params: {
        ...(session.carried ?? {}),
        ...(session.segment ? { segment: session.segment } : {}),
        allowZeroShot: session.allowZeroShot,
      },
    });

    try {
      const res = await runTurn(ctx, { log });
      session.carried = carryOver(res);
      const { text, meta } = renderReply(res.outputs);
      session.turns.push({ role: 'assistant', content: text });

      const block = createBlock('Assistant', text, chalk.greenBright, (v) => v);
      console.log();
      console.log(block.top);
      if (block.body.length > 0) console.log(block.body);
      console.log(block.bottom);
      if (meta) console.log(chalk.gray(`  ${meta} style=${res.style}`));
      console.log();
    } catch (error) {
      const std = toStdError(error, 'cli');
      console.log(chalk.red(`❌ Error processing request: ${std.message}`));
    }
  }
  rl.close();
}

main().catch((e) => (console.error(e), process.exit(1)));
