import {
  SECTION_ORDER,
  chooseNextProgress,
  currentQuestion,
  firstProgress,
  nextProgress,
  normalizeProgress,
  scoreSlot,
  sectionSlots,
  totalSlotCount,
} from '../../../src/core/script_catalog.js';

describe('script catalog', () => {
  it('should hold four sections of 4, 5, 7 and 10 slots', () => {
    expect(SECTION_ORDER).toEqual(['A', 'B', 'C', 'D']);
    expect(SECTION_ORDER.map((s) => sectionSlots(s).length)).toEqual([4, 5, 7, 10]);
    expect(totalSlotCount()).toBe(26);
  });

  it('should have unique slot ids', () => {
    const ids = SECTION_ORDER.flatMap((s) => sectionSlots(s).map((slot) => slot.id));
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('should fill the segment label into the market-size question', () => {
    const progress = { section: 'C' as const, index: 3, answered: [] };
    expect(currentQuestion(progress, 'camping')).toEqual({
      id: 'C4_market_size',
      text: '캠핑/글램핑 시장 규모와 최근 성장 추세에 대해 알고 있나요?',
    });
    expect(currentQuestion(progress, null)?.text).toBe('여행·레저 시장 규모와 최근 성장 추세에 대해 알고 있나요?');
  });

  it('should return null past the end of a section', () => {
    expect(currentQuestion({ section: 'A', index: 4, answered: [] }, null)).toBeNull();
  });
});

describe('progress movement', () => {
  it('should advance within a section and roll into the next', () => {
    expect(nextProgress({ section: 'A', index: 0, answered: ['A1_problem'] })).toEqual({
      section: 'A',
      index: 1,
      answered: ['A1_problem'],
    });
    expect(nextProgress({ section: 'A', index: 3, answered: ['A4_unmet'] })).toEqual({
      section: 'B',
      index: 0,
      answered: ['A4_unmet'],
    });
  });

  it('should end after the last section', () => {
    expect(nextProgress({ section: 'D', index: 9, answered: [] })).toBeNull();
  });

  it('should normalize a cursor past the end of a non-final section', () => {
    expect(normalizeProgress({ section: 'B', index: 5, answered: ['B5_edge'] })).toEqual({
      section: 'C',
      index: 0,
      answered: ['B5_edge'],
    });
    expect(normalizeProgress({ section: 'D', index: 10, answered: [] })).toEqual({
      section: 'D',
      index: 10,
      answered: [],
    });
    expect(firstProgress()).toEqual({ section: 'A', index: 0, answered: [] });
  });

  it('should score slots by distinct keyword hits', () => {
    expect(scoreSlot('수익 모델과 광고', 'D1_revenue_sources')).toBe(2);
    expect(scoreSlot('수익 모델과 광고', 'D2_model')).toBe(0);
    expect(scoreSlot('', 'D1_revenue_sources')).toBe(0);
    expect(scoreSlot('광고', 'Z9_missing')).toBe(0);
  });

  it('should jump forward to the best-scoring unanswered slot', () => {
    const next = chooseNextProgress(
      { section: 'B', index: 0, answered: ['B1_core_service'] },
      '경쟁사 대비 차별화 강점이 있어요',
    );
    expect(next).toEqual({ section: 'B', index: 3, answered: ['B1_core_service'] });
  });

  it('should never jump backwards', () => {
    const next = chooseNextProgress({ section: 'B', index: 3, answered: ['B4_diff'] }, '강습과 예약을 통합한 핵심 서비스');
    expect(next).toEqual({ section: 'B', index: 4, answered: ['B4_diff'] });
  });

  it('should skip answered candidates', () => {
    const next = chooseNextProgress(
      { section: 'C', index: 0, answered: ['C1_consumer', 'C4_market_size'] },
      '시장 규모는 커지고 있어요',
    );
    expect(next).toEqual({ section: 'C', index: 1, answered: ['C1_consumer', 'C4_market_size'] });
  });
});
