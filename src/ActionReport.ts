import chalk from 'chalk';
import { IncomingWebhook } from '@slack/webhook';
import type { KnownBlock } from '@slack/types';

export type ReportCategory = 'header' | 'info' | 'add' | 'warn';

export interface ReportEntry {
  category: ReportCategory;
  text: string;
}

export type LogMode = 'color' | 'plain';

export interface ActionReportOptions {
  mode: LogMode;
  /** Print each entry to the console as it is recorded */
  echo: boolean;
}

const MARKERS: Record<Exclude<ReportCategory, 'header'>, string> = {
  info: '=',
  add: '+',
  warn: '!',
};

export const renderEntry = (entry: ReportEntry, mode: LogMode): string => {
  if (entry.category === 'header') {
    return mode === 'plain' ? entry.text : chalk.bold.underline(entry.text);
  }

  const line = `  ${MARKERS[entry.category]} ${entry.text}`;
  if (mode === 'plain') return line;
  switch (entry.category) {
    case 'info':
      return chalk.dim(line);
    case 'add':
      return chalk.green(line);
    case 'warn':
      return chalk.yellow(line);
  }
};

const createMarkdownBlock = (msg: string): KnownBlock => ({
  type: 'section',
  text: {
    type: 'mrkdwn',
    text: msg,
  },
});

const createContextBlock = (msg: string): KnownBlock => ({
  type: 'context',
  elements: [
    {
      type: 'mrkdwn',
      text: msg,
    },
  ],
});

export class ActionReport {
  private readonly entries: ReportEntry[] = [];

  private constructor(private readonly options: ActionReportOptions) {}

  public static create(options: Partial<ActionReportOptions> = {}) {
    return new ActionReport({ mode: 'color', echo: true, ...options });
  }

  public header(text: string) {
    return this.record('header', text);
  }

  public info(text: string) {
    return this.record('info', text);
  }

  public add(text: string) {
    return this.record('add', text);
  }

  public warn(text: string) {
    return this.record('warn', text);
  }

  public get lines(): readonly ReportEntry[] {
    return this.entries;
  }

  /** Number of entries that describe a change, planned or applied */
  public changes() {
    return this.entries.filter((e) => e.category === 'add' || e.category === 'warn').length;
  }

  public toBlocks(): KnownBlock[] {
    const blocks: KnownBlock[] = [];
    for (const entry of this.entries) {
      switch (entry.category) {
        case 'header':
          blocks.push(createMarkdownBlock(`*${entry.text}*`));
          break;
        case 'add':
          blocks.push(createContextBlock(`:heavy_plus_sign: ${entry.text}`));
          break;
        case 'warn':
          blocks.push(createContextBlock(`:warning: ${entry.text}`));
          break;
      }
    }
    return blocks;
  }

  /**
   * Posts the changes in this report to a Slack incoming webhook, 50 blocks
   * per message. Reports without changes are not sent.
   */
  async send(webhookUrl: string) {
    if (this.changes() === 0) return;

    const hook = new IncomingWebhook(webhookUrl);
    const allBlocks = this.toBlocks();
    while (allBlocks.length > 0) {
      await hook.send({
        text: 'Organization reconciled',
        blocks: allBlocks.splice(0, 50),
      });
    }
  }

  private record(category: ReportCategory, text: string) {
    const entry = { category, text };
    this.entries.push(entry);
    if (this.options.echo) {
      console.info(renderEntry(entry, this.options.mode));
    }
    return this;
  }
}
