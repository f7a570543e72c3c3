import { runScriptTurn } from '../../../src/core/script_engine.js';
import { SCRIPT_MESSAGES, totalSlotCount } from '../../../src/core/script_catalog.js';
import type { ProgressT } from '../../../src/schemas/ideation.js';

describe('runScriptTurn', () => {
  it('should ask the first question on a fresh session', () => {
    expect(runScriptTurn({ userText: '캠핑으로 할래요', segment: 'camping', isOnTopic: true })).toEqual({
      mode: 'ask',
      question: '당신이 주목한 문제나 새로운 기회는 무엇인가요?',
      slotKey: 'A1_problem',
      section: 'A',
      progress: { section: 'A', index: 0, answered: [] },
    });
  });

  it('should record the answer and move to the next slot', () => {
    const out = runScriptTurn({
      progress: { section: 'A', index: 0, answered: [] },
      lastSlot: 'A1_problem',
      userText: '캠핑장 예약이 너무 불편해요',
      segment: 'camping',
      isOnTopic: true,
    });
    expect(out).toMatchObject({
      mode: 'ask',
      slotKey: 'A2_pain',
      progress: { section: 'A', index: 1, answered: ['A1_problem'] },
    });
  });

  it('should jump when the answer mentions a later topic', () => {
    const out = runScriptTurn({
      progress: { section: 'C', index: 0, answered: [] },
      lastSlot: 'C1_consumer',
      userText: '시장 규모 자료도 있어요',
      segment: 'sports',
      isOnTopic: true,
    });
    expect(out).toMatchObject({
      mode: 'ask',
      slotKey: 'C4_market_size',
      question: '레저 스포츠(서핑/등산 등) 시장 규모와 최근 성장 추세에 대해 알고 있나요?',
      progress: { section: 'C', index: 3, answered: ['C1_consumer'] },
    });
  });

  it('should re-ask when the last slot does not match the cursor', () => {
    const out = runScriptTurn({
      progress: { section: 'A', index: 1, answered: [] },
      lastSlot: 'A1_problem',
      userText: 'answer',
      segment: null,
      isOnTopic: true,
    });
    expect(out).toMatchObject({ mode: 'ask', slotKey: 'A2_pain', progress: { index: 1, answered: [] } });
  });

  it('should not advance on an empty answer', () => {
    const out = runScriptTurn({
      progress: { section: 'A', index: 0, answered: [] },
      lastSlot: 'A1_problem',
      userText: '   ',
      segment: null,
      isOnTopic: true,
    });
    expect(out).toMatchObject({ mode: 'ask', slotKey: 'A1_problem' });
  });

  it('should return a notice and keep progress when off topic', () => {
    const progress: ProgressT = { section: 'B', index: 2, answered: ['B1_core_service'] };
    expect(runScriptTurn({ progress, lastSlot: 'B3_features', userText: 'x', segment: null, isOnTopic: false })).toEqual({
      mode: 'notice',
      message: SCRIPT_MESSAGES.offTopic,
      progress,
    });
  });

  it('should roll a past-end cursor into the next section', () => {
    const out = runScriptTurn({ progress: { section: 'A', index: 4, answered: [] }, userText: 'hi', segment: null, isOnTopic: true });
    expect(out).toMatchObject({ mode: 'ask', slotKey: 'B1_core_service', section: 'B' });
  });

  it('should end after the last slot is answered', () => {
    const out = runScriptTurn({
      progress: { section: 'D', index: 9, answered: [] },
      lastSlot: 'D10_trust',
      userText: 'ok noted',
      segment: null,
      isOnTopic: true,
    });
    expect(out).toEqual({ mode: 'end', message: SCRIPT_MESSAGES.end, progress: null });
  });

  it('should visit every slot exactly once in a linear walk', () => {
    const asked: string[] = [];
    let progress: ProgressT | undefined;
    let lastSlot: string | undefined;

    for (let turn = 0; turn < 40; turn++) {
      const out = runScriptTurn({ progress, lastSlot, userText: 'ok noted', segment: null, isOnTopic: true });
      if (out.mode !== 'ask') {
        expect(out.mode).toBe('end');
        break;
      }
      asked.push(out.slotKey);
      progress = out.progress;
      lastSlot = out.slotKey;
    }

    expect(asked).toHaveLength(totalSlotCount());
    expect(new Set(asked).size).toBe(26);
    expect(asked[0]).toBe('A1_problem');
    expect(asked[4]).toBe('B1_core_service');
    expect(asked[25]).toBe('D10_trust');
    expect(progress?.answered).toHaveLength(25);
  });
});
