import { describe, it, expect } from 'vitest';
import { PriorityManager } from '../src/priority';

describe('Priority System (Rule 117)', () => {
  it('should start with the active player holding priority', () => {
    const priority = new PriorityManager(['p1', 'p2'], 'p1');
    expect(priority.holder).toBe('p1');
    expect(priority.hasPriority('p1')).toBe(true);
    expect(priority.hasPriority('p2')).toBe(false);
  });

  it('should pass priority to the next player in turn order', () => {
    const priority = new PriorityManager(['p1', 'p2'], 'p1');
    expect(priority.passPriority('p1', true)).toEqual({ kind: 'priorityPassed', to: 'p2' });
    expect(priority.holder).toBe('p2');
  });

  it('should reject a pass from a player without priority', () => {
    const priority = new PriorityManager(['p1', 'p2'], 'p1');
    const result = priority.passPriority('p2', true);
    expect(result.kind).toBe('rejected');
    expect(priority.holder).toBe('p1');
  });

  it('should end the step when all players pass with an empty stack (rule 500.2)', () => {
    const priority = new PriorityManager(['p1', 'p2'], 'p1');
    priority.passPriority('p1', true);
    expect(priority.passPriority('p2', true)).toEqual({ kind: 'stepEnded' });
    expect(priority.holder).toBe('p1');
  });

  it('should resolve the top object when all players pass with a non-empty stack (rule 117.4)', () => {
    const priority = new PriorityManager(['p1', 'p2'], 'p2');
    priority.passPriority('p2', false);
    expect(priority.passPriority('p1', false)).toEqual({ kind: 'resolveTop' });
    expect(priority.holder).toBe('p2');
  });

  it('should restart the run of passes when a player acts (rule 117.3c)', () => {
    const priority = new PriorityManager(['p1', 'p2'], 'p1');
    priority.passPriority('p1', true);
    priority.playerActed('p2');

    expect(priority.holder).toBe('p2');
    expect(priority.passPriority('p2', false)).toEqual({ kind: 'priorityPassed', to: 'p1' });
    expect(priority.passPriority('p1', false)).toEqual({ kind: 'resolveTop' });
  });

  it('should hand priority to the new active player at the start of a turn', () => {
    const priority = new PriorityManager(['p1', 'p2'], 'p1');
    priority.passPriority('p1', true);
    priority.setActivePlayer('p2');

    expect(priority.activePlayer).toBe('p2');
    expect(priority.holder).toBe('p2');
    expect(priority.passPriority('p2', true).kind).toBe('priorityPassed');
  });

  it('should refuse players who are not in the game', () => {
    expect(() => new PriorityManager(['p1', 'p2'], 'p3')).toThrow();
    const priority = new PriorityManager(['p1', 'p2'], 'p1');
    expect(() => priority.setActivePlayer('p3')).toThrow();
  });
});
