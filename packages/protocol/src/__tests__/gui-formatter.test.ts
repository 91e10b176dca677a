import { describe, it, expect } from 'vitest';
import { GUI_COMMANDS } from '@ucikit/types';

import { formatGo, formatGuiCmd, formatPosition, parseGuiCmd, type GuiCmd } from '../index.js';

describe('GUI command formatter', () => {
  it('formats zero-argument commands', () => {
    expect(formatGuiCmd({ kind: 'uci' })).toBe('uci');
    expect(formatGuiCmd({ kind: 'isReady' })).toBe('isready');
    expect(formatGuiCmd({ kind: 'newGame' })).toBe('ucinewgame');
    expect(formatGuiCmd({ kind: 'stop' })).toBe('stop');
    expect(formatGuiCmd({ kind: 'ponderHit' })).toBe('ponderhit');
  });

  it('starts every command with a keyword from GUI_COMMANDS', () => {
    const commands: GuiCmd[] = [
      { kind: 'uci' },
      { kind: 'debug', on: true },
      { kind: 'isReady' },
      { kind: 'setOption', option: { name: 'Hash', value: '64' } },
      { kind: 'newGame' },
      { kind: 'position', position: { base: { kind: 'startPos' } } },
      { kind: 'go', go: { depth: 1 } },
      { kind: 'stop' },
      { kind: 'ponderHit' },
    ];
    expect(commands.map((cmd) => formatGuiCmd(cmd).split(' ')[0])).toEqual([...GUI_COMMANDS]);
  });

  it('formats debug', () => {
    expect(formatGuiCmd({ kind: 'debug', on: true })).toBe('debug on');
    expect(formatGuiCmd({ kind: 'debug', on: false })).toBe('debug off');
  });

  it('formats setoption', () => {
    expect(formatGuiCmd({ kind: 'setOption', option: { name: 'Clear Hash' } })).toBe(
      'setoption name Clear Hash',
    );
    expect(formatGuiCmd({ kind: 'setOption', option: { name: 'Hash', value: '64' } })).toBe(
      'setoption name Hash value 64',
    );
  });

  it('formats positions', () => {
    expect(formatPosition({ base: { kind: 'startPos' } })).toBe('position startpos');
    expect(formatPosition({ base: { kind: 'startPos' }, moves: [] })).toBe('position startpos');
    expect(
      formatPosition({
        base: { kind: 'fen', fen: '8/8/8/8/8/8/8/K6k w - - 0 1' },
        moves: ['a1a2', 'h1h2'],
      }),
    ).toBe('position fen 8/8/8/8/8/8/8/K6k w - - 0 1 moves a1a2 h1h2');
  });

  it('formats go limits in declaration order', () => {
    expect(
      formatGo({
        infinite: true,
        moveTime: 900,
        depth: 8,
        ponder: true,
        searchMoves: ['e2e4'],
        wtime: 1000,
      }),
    ).toBe('go searchmoves e2e4 ponder wtime 1000 depth 8 movetime 900 infinite');
  });

  describe('round trip through the parser', () => {
    const commands: GuiCmd[] = [
      { kind: 'uci' },
      { kind: 'debug', on: true },
      { kind: 'isReady' },
      { kind: 'setOption', option: { name: 'Clear Hash' } },
      { kind: 'setOption', option: { name: 'NalimovPath', value: 'c:\\chess\\tb\\4;c:\\chess\\tb\\5' } },
      { kind: 'newGame' },
      {
        kind: 'position',
        position: { base: { kind: 'startPos' }, moves: ['e2e4', 'e7e5', 'g1f3'] },
      },
      {
        kind: 'position',
        position: { base: { kind: 'fen', fen: '4k3/8/8/8/8/8/4P3/4K3 w - - 5 39' } },
      },
      {
        kind: 'go',
        go: {
          searchMoves: ['e2e4', 'd2d4'],
          ponder: true,
          wtime: 120000,
          btime: 118000,
          winc: 1000,
          binc: 1000,
          movesToGo: 30,
          depth: 24,
          nodes: 5000000,
          mate: 4,
          moveTime: 3000,
          infinite: true,
        },
      },
      { kind: 'go', go: { infinite: true } },
      { kind: 'stop' },
      { kind: 'ponderHit' },
    ];

    for (const cmd of commands) {
      it(`reparses "${formatGuiCmd(cmd)}"`, () => {
        expect(parseGuiCmd(formatGuiCmd(cmd))).toEqual({ success: true, value: cmd });
      });
    }
  });
});
