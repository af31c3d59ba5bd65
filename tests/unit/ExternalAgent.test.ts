import fs from 'fs';
import os from 'os';
import path from 'path';

import {
  ExternalAgent,
  encodeAgentState,
  selectAgentMove,
} from '../../src/server/game/ExternalAgent';
import { createInitialGameState } from '../../src/shared/engine/initialState';
import { GameErrorCode, isGameError } from '../../src/shared/errors/GameDomainErrors';
import { pitMove } from '../../src/shared/types/game';
import { createCancellationSource } from '../../src/shared/utils/cancellation';
import { board } from '../utils/fixtures';

describe('ExternalAgent', () => {
  describe('encodeAgentState', () => {
    it('lists stores then pits from the mover point of view', () => {
      expect(encodeAgentState(createInitialGameState({ pits: 3 }))).toBe('0 0 4 4 4 4 4 4');
      const p2 = board([1, 2], [3, 4], { stores: [5, 6], currentTurn: 2 });
      expect(encodeAgentState(p2)).toBe('6 5 3 4 1 2');
    });
  });

  describe('selectAgentMove', () => {
    const opening = createInitialGameState();

    it('takes the first legal integer token', () => {
      expect(selectAgentMove(opening, 'hello 9 0 3\n')).toEqual(pitMove(3));
      expect(selectAgentMove(opening, '+2')).toEqual(pitMove(2));
    });

    it('returns null when nothing is legal', () => {
      expect(selectAgentMove(opening, '')).toBeNull();
      expect(selectAgentMove(opening, '-1 7 2.5 swap')).toBeNull();
    });
  });

  describe('file protocol', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kalah-agent-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    function agent(timeoutMs: number): ExternalAgent {
      return new ExternalAgent({ dir: path.join(dir, 'io'), pollIntervalMs: 5, timeoutMs });
    }

    it('names files by ply', () => {
      const a = agent(100);
      expect(a.stateFilePath(3)).toBe(path.join(dir, 'io', 'state_3.txt'));
      expect(a.moveFilePath(3)).toBe(path.join(dir, 'io', 'move_3.txt'));
    });

    it('writes the state and reads an existing answer', async () => {
      const a = agent(1000);
      fs.mkdirSync(a.dir, { recursive: true });
      fs.writeFileSync(a.moveFilePath(1), '4\n');

      const result = await a.requestMove(createInitialGameState({ pits: 4, stonesPerPit: 1 }));
      expect(result.kind).toBe('ok');
      if (result.kind === 'ok') {
        expect(result.move).toEqual(pitMove(4));
      }
      expect(fs.readFileSync(a.stateFilePath(1), 'utf8')).toBe('0 0 1 1 1 1 1 1 1 1\n');
    });

    it('polls until the answer appears', async () => {
      const a = agent(2000);
      fs.mkdirSync(a.dir, { recursive: true });
      const pending = a.requestMove(createInitialGameState());
      setTimeout(() => fs.writeFileSync(a.moveFilePath(1), '6'), 30);
      const result = await pending;
      expect(result.kind === 'ok' && result.move).toEqual(pitMove(6));
    });

    it('times out when the answer never names a legal move', async () => {
      const a = agent(40);
      fs.mkdirSync(a.dir, { recursive: true });
      fs.writeFileSync(a.moveFilePath(1), '0');
      const result = await a.requestMove(createInitialGameState());
      expect(result.kind).toBe('timeout');
    });

    it('stops waiting when canceled', async () => {
      const a = agent(5000);
      const source = createCancellationSource();
      const pending = a.requestMove(createInitialGameState(), source.token);
      setTimeout(() => source.cancel('shutdown'), 20);

      let code: string | undefined;
      try {
        await pending;
      } catch (error) {
        code = isGameError(error) ? error.code : undefined;
      }
      expect(code).toBe(GameErrorCode.AGENT_CANCELED);
    });
  });
});
