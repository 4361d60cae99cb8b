import ora, { type Ora } from 'ora';
import chalk from 'chalk';

type Outcome = 'succeed' | 'fail' | 'warn';

/** Progress line for a single run; a no-op when disabled (JSON output, no TTY). */
export class Spinner {
  private spinner: Ora | null = null;
  private enabled: boolean;

  constructor(enabled = true) {
    this.enabled = enabled;
  }

  start(text: string): this {
    if (this.enabled) {
      this.spinner = ora({ text, color: 'cyan' }).start();
    }
    return this;
  }

  update(text: string): this {
    if (this.spinner) {
      this.spinner.text = text;
    }
    return this;
  }

  succeed(text?: string): this {
    return this.settle('succeed', text);
  }

  fail(text?: string): this {
    return this.settle('fail', text);
  }

  warn(text?: string): this {
    return this.settle('warn', text);
  }

  private settle(outcome: Outcome, text?: string): this {
    this.spinner?.[outcome](text);
    this.spinner = null;
    return this;
  }
}

export function specialistLabel(role: string, action: string): string {
  return `${chalk.cyan(`[${role}]`)} ${action}`;
}
