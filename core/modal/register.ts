/**
 * The unnamed register, written by yank/delete/change and read by put.
 */

export interface RegisterContent {
  readonly text: string;
  /** Whole lines (dd, yy) rather than a character range. */
  readonly linewise: boolean;
}

export class Register {
  private content: RegisterContent = { text: '', linewise: false };

  get(): RegisterContent {
    return this.content;
  }

  set(text: string, linewise: boolean): void {
    this.content = Object.freeze({ text, linewise });
  }

  get isEmpty(): boolean {
    return this.content.text.length === 0 && !this.content.linewise;
  }
}
