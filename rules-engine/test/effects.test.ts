/**
 * Tests for Rule 608.2: applying spell and ability effects
 */
import { describe, it, expect } from 'vitest';
import type { Effect, Target } from '../../shared/src';
import { applyEffects, type EffectContext } from '../src/effects';
import { hasKeyword, requirePlayer } from '../src/gameState';
import { targetRequirements } from '../src/targeting';
import { basicLand, battlefield, creatureCard, keywords, setupGame } from './fixtures';

function spellContext(targets: Target[] = []): EffectContext {
  return { controller: 'p1', sourceId: null, sourceName: 'Test Spell', colors: ['B'], isArtifact: false, targets };
}

const chosen = (index: number) => ({ kind: 'chosen', index, requirement: 'creature' }) as const;

describe('Effects', () => {
  it('should number target slots by chosen index', () => {
    const effects: Effect[] = [
      { kind: 'dealDamage', amount: 1, target: { kind: 'chosen', index: 1, requirement: 'player' } },
      { kind: 'destroy', target: chosen(0) },
      { kind: 'gainLife', amount: 2, target: { kind: 'controller' } },
    ];
    expect(targetRequirements(effects)).toEqual(['creature', 'player']);
  });

  it('should not destroy an indestructible creature', () => {
    const { state } = setupGame();
    const golem = battlefield(state, creatureCard('Golem', 3, 3, { abilities: [keywords('indestructible')] }), 'p2');

    const log = applyEffects(state, [{ kind: 'destroy', target: chosen(0) }], spellContext([{ kind: 'permanent', id: golem.id }]));

    expect(log).toEqual(['Golem is indestructible']);
    expect(state.permanents.has(golem.id)).toBe(true);
  });

  it('should return a permanent to its owner hand', () => {
    const { state } = setupGame();
    const bear = battlefield(state, creatureCard('Bear', 2, 2), 'p2');

    applyEffects(state, [{ kind: 'returnToHand', target: chosen(0) }], spellContext([{ kind: 'permanent', id: bear.id }]));

    expect(state.permanents.has(bear.id)).toBe(false);
    expect(requirePlayer(state, 'p2').hand).toEqual([bear.card]);
  });

  it('should apply effects in order', () => {
    const { state } = setupGame();
    const bear = battlefield(state, creatureCard('Bear', 2, 2), 'p1');
    const effects: Effect[] = [
      { kind: 'modifyStats', power: 2, toughness: 2, duration: 'untilEndOfTurn', target: chosen(0) },
      { kind: 'grantKeyword', keyword: 'flying', duration: 'untilEndOfTurn', target: chosen(0) },
      { kind: 'dealDamage', amount: 3, target: chosen(0) },
    ];

    applyEffects(state, effects, spellContext([{ kind: 'permanent', id: bear.id }]));

    expect(state.permanents.has(bear.id)).toBe(true);
    expect(bear.damage).toBe(3);
    expect(hasKeyword(bear, 'flying')).toBe(true);
  });

  it('should make each opponent lose life and the controller draw', () => {
    const { state } = setupGame();
    const alice = requirePlayer(state, 'p1');
    alice.library.push(basicLand('Swamp'));

    applyEffects(
      state,
      [
        { kind: 'loseLife', amount: 2, target: { kind: 'eachOpponent' } },
        { kind: 'drawCards', amount: 1, target: { kind: 'controller' } },
      ],
      spellContext()
    );

    expect(requirePlayer(state, 'p2').life).toBe(18);
    expect(alice.hand).toHaveLength(1);
    expect(alice.library).toHaveLength(0);
  });

  it('should record a draw from an empty library', () => {
    const { state } = setupGame();

    applyEffects(state, [{ kind: 'drawCards', amount: 2, target: { kind: 'controller' } }], spellContext());

    expect(requirePlayer(state, 'p1').drewFromEmptyLibrary).toBe(true);
  });

  it('should tap and untap target permanents', () => {
    const { state } = setupGame();
    const bear = battlefield(state, creatureCard('Bear', 2, 2), 'p2');
    const target = [{ kind: 'permanent', id: bear.id } as const];

    applyEffects(state, [{ kind: 'tapPermanent', target: chosen(0) }], spellContext(target));
    expect(bear.tapped).toBe(true);

    applyEffects(state, [{ kind: 'untapPermanent', target: chosen(0) }], spellContext(target));
    expect(bear.tapped).toBe(false);
  });

  it('should add mana to the controller pool', () => {
    const { state } = setupGame();

    applyEffects(state, [{ kind: 'addMana', mana: 'G', amount: 2 }], spellContext());

    expect(requirePlayer(state, 'p1').manaPool.G).toBe(2);
  });
});
