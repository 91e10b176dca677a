import { describe, it, expect } from 'vitest';

import { GoBuilder, PositionBuilder } from '../index.js';

describe('GoBuilder', () => {
  it('fails when nothing is set', () => {
    const result = new GoBuilder().build();
    expect(result).toEqual({ success: false, error: { kind: 'NothingSetForGo' } });
  });

  it('accumulates limits in any order', () => {
    const result = new GoBuilder().movesToGo(20).wtime(60000).btime(55000).depth(12).build();
    expect(result).toEqual({
      success: true,
      value: { movesToGo: 20, wtime: 60000, btime: 55000, depth: 12 },
    });
  });

  it('accepts infinite on its own', () => {
    const result = new GoBuilder().infinite().build();
    expect(result).toEqual({ success: true, value: { infinite: true } });
  });

  it('lets a later setter overwrite an earlier one', () => {
    const result = new GoBuilder().depth(5).depth(9).build();
    expect(result.success && result.value.depth).toBe(9);
  });

  it('copies the search move list', () => {
    const moves = ['e2e4', 'd2d4'];
    const builder = new GoBuilder().searchMoves(moves);
    moves.push('c2c4');
    const result = builder.build();
    expect(result.success && result.value.searchMoves).toEqual(['e2e4', 'd2d4']);
  });

  it('is emptied by build()', () => {
    const builder = new GoBuilder().nodes(1000);
    expect(builder.build().success).toBe(true);
    expect(builder.build()).toEqual({ success: false, error: { kind: 'NothingSetForGo' } });
  });

  it('returns a frozen command', () => {
    const result = new GoBuilder().ponder().build();
    expect(result.success && Object.isFrozen(result.value)).toBe(true);
  });
});

describe('PositionBuilder', () => {
  it('fails without a base position', () => {
    const result = new PositionBuilder().addMove('e2e4').build();
    expect(result).toEqual({ success: false, error: { kind: 'Position' } });
  });

  it('builds the start position without moves', () => {
    const result = new PositionBuilder().startPos().build();
    expect(result).toEqual({ success: true, value: { base: { kind: 'startPos' } } });
  });

  it('keeps moves in the order they were added', () => {
    const result = new PositionBuilder()
      .startPos()
      .addMove('e2e4')
      .addMove('c7c5')
      .addMove('g1f3')
      .build();
    expect(result.success && result.value.moves).toEqual(['e2e4', 'c7c5', 'g1f3']);
  });

  it('uses the last base position set', () => {
    const fen = '8/8/8/8/8/8/8/K6k w - - 0 1';
    const result = new PositionBuilder().startPos().fen(fen).build();
    expect(result.success && result.value.base).toEqual({ kind: 'fen', fen });

    const back = new PositionBuilder().fen(fen).startPos().build();
    expect(back.success && back.value.base).toEqual({ kind: 'startPos' });
  });

  it('keeps its moves when build() fails', () => {
    const builder = new PositionBuilder().addMove('e2e4').addMove('e7e5');
    expect(builder.build()).toEqual({ success: false, error: { kind: 'Position' } });

    const result = builder.startPos().build();
    expect(result).toEqual({
      success: true,
      value: { base: { kind: 'startPos' }, moves: ['e2e4', 'e7e5'] },
    });
  });

  it('is single use', () => {
    const builder = new PositionBuilder().startPos().addMove('e2e4');
    expect(builder.build().success).toBe(true);
    expect(builder.build()).toEqual({ success: false, error: { kind: 'Position' } });
  });
});
