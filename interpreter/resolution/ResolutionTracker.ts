import type { Node } from '@core/tree';

/**
 * Stack of nodes whose resolution or modification is in progress.
 */
export class ResolutionTracker {
  private readonly stack: Node[] = [];

  get depth(): number {
    return this.stack.length;
  }

  enter(node: Node): void {
    this.stack.push(node);
  }

  leave(node: Node): void {
    const index = this.stack.lastIndexOf(node);
    if (index >= 0) {
      this.stack.splice(index, 1);
    }
  }

  /**
   * Qualified names from the earliest in-progress visit of `node` to the top
   * of the stack, closed with `node` again: `a -> b -> a`.
   */
  cycleThrough(node: Node): string[] {
    const index = this.stack.indexOf(node);
    const path = index >= 0 ? this.stack.slice(index) : [node];
    return [...path, node].map(item => item.qualifiedName);
  }
}
