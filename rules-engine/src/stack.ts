// Stack implementation following rule 405 and 608
import type { StackItem, StackItemID } from '../../shared/src';
import { EmptyStackError } from './core/errors';

/**
 * The stack (rule 405). Items are added on top and leave from the top only;
 * nothing is ever inserted below the top or reordered.
 */
export class PriorityStack {
  private readonly items: StackItem[] = [];

  /**
   * Put an item on top of the stack (rule 601.2a for spells, 602.2a / 603.3 for abilities)
   */
  push(item: StackItem): void {
    this.items.push(item);
  }

  /**
   * Remove and return the top item (rule 608.2m).
   * @throws EmptyStackError when the stack is empty
   */
  pop(): StackItem {
    const top = this.items.pop();
    if (top === undefined) {
      throw new EmptyStackError();
    }
    return top;
  }

  peek(): StackItem | undefined {
    return this.items[this.items.length - 1];
  }

  size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Lookup for targeting; does not change order */
  find(id: StackItemID): StackItem | undefined {
    return this.items.find(item => item.id === id);
  }
}
