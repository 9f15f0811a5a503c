/**
 * BraceCounter - Running tally of unmatched braces during a scan.
 * Unbalanced input is not reported; the depth just never returns to its baseline.
 */
export class BraceCounter {
  private count = 0;

  process(fragment: string): void {
    for (const char of fragment) {
      if (char === '{') {
        this.count++;
      } else if (char === '}') {
        this.count--;
      }
    }
  }

  get depth(): number {
    return this.count;
  }
}
