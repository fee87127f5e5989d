export type QuoteStyle = '"' | "'";

/**
 * One expect/send pair: wait for `promptText`, then send `commandText`
 * followed by a newline.
 *
 * The command is inserted verbatim. Shell and Tcl metacharacters (globs,
 * `$`, quotes) reach the remote side unescaped.
 */
export class Step {
  readonly expectation: string;
  readonly action: string;

  constructor(
    readonly promptText: string,
    readonly commandText: string,
    readonly quote: QuoteStyle = '"'
  ) {
    this.expectation = quote === '"'
      ? `expect "${promptText}"`
      : `expect \\'${promptText}\\'`;
    this.action = `send "${commandText}\\n"`;
  }

  render(sep: string = '\n'): string {
    return `${this.expectation}${sep}${this.action}${sep}`;
  }

  toString(): string {
    return this.render();
  }
}

export function renderSteps(steps: readonly Step[], sep: string = '\n'): string {
  return steps.map((step) => step.render(sep)).join('');
}
