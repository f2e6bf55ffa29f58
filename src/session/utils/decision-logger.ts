import { promises as fs } from 'fs';
import path from 'path';

export type DecisionLogEntry = {
  ts: string;
  iteration: number;
  token_id: string;
  estimate?: number;
  market_quote?: number | null;
  edge?: number;
  action: 'no_quote' | 'skip' | 'trade' | 'error';
  reason?: string;
  order_size?: number;
  status?: string;
  order_id?: string;
  spent: number;
};

export class DecisionLogger {
  private readonly path?: string;

  constructor(path?: string) {
    this.path = path || undefined;
  }

  get enabled(): boolean {
    return this.path !== undefined;
  }

  async append(entry: DecisionLogEntry): Promise<void> {
    if (!this.path) return;
    const line = `${JSON.stringify(entry)}\n`;
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.appendFile(this.path, line, { encoding: 'utf8' });
  }
}
