import { z } from 'zod';
import catalogData from '../data/script_catalog.json';
import { SectionId, type ProgressT, type SectionIdT, type SegmentT } from '../schemas/ideation.js';
import { countKeywordHits, normalizeText } from './text_normalize.js';

const SlotEntrySchema = z.object({
  id: z.string().min(1),
  question: z.string().min(1),
  keywords: z.array(z.string().min(1)).default([]),
  segmentTemplate: z.boolean().default(false),
});

const CatalogSchema = z.object({
  sections: z.object({
    A: z.array(SlotEntrySchema).min(1),
    B: z.array(SlotEntrySchema).min(1),
    C: z.array(SlotEntrySchema).min(1),
    D: z.array(SlotEntrySchema).min(1),
  }),
  sectionOrder: z.array(SectionId).length(4),
  segmentLabels: z.object({
    default: z.string().min(1),
    camping: z.string().min(1),
    experience: z.string().min(1),
    sports: z.string().min(1),
  }),
  messages: z.object({
    offTopic: z.string().min(1),
    end: z.string().min(1),
  }),
});

export type Slot = {
  id: string;
  section: SectionIdT;
  position: number;
  question: string;
  // Normalized jump keywords; empty for slots only reached linearly.
  keywords: readonly string[];
  segmentTemplate: boolean;
};

export type Question = { id: string; text: string };

const CATALOG = CatalogSchema.parse(catalogData);

export const SECTION_ORDER: readonly SectionIdT[] = CATALOG.sectionOrder;
export const SCRIPT_MESSAGES = CATALOG.messages;

const SLOTS: Record<SectionIdT, readonly Slot[]> = {
  A: buildSection('A'),
  B: buildSection('B'),
  C: buildSection('C'),
  D: buildSection('D'),
};

const SLOT_BY_ID = new Map<string, Slot>(
  SECTION_ORDER.flatMap((section) => SLOTS[section].map((slot): [string, Slot] => [slot.id, slot])),
);

function buildSection(section: SectionIdT): Slot[] {
  return CATALOG.sections[section].map((entry, position) => ({
    id: entry.id,
    section,
    position,
    question: entry.question,
    keywords: entry.keywords.map(normalizeText),
    segmentTemplate: entry.segmentTemplate,
  }));
}

export function sectionSlots(section: SectionIdT): readonly Slot[] {
  return SLOTS[section];
}

export function getSlot(id: string): Slot | undefined {
  return SLOT_BY_ID.get(id);
}

export function totalSlotCount(): number {
  return SECTION_ORDER.reduce((sum, section) => sum + SLOTS[section].length, 0);
}

function segmentLabel(segment: SegmentT | null): string {
  return segment ? CATALOG.segmentLabels[segment] : CATALOG.segmentLabels.default;
}

function questionText(slot: Slot, segment: SegmentT | null): string {
  if (!slot.segmentTemplate) return slot.question;
  return slot.question.replace('{segment}', segmentLabel(segment));
}

export function firstProgress(): ProgressT {
  const first = SECTION_ORDER[0] ?? 'A';
  return { section: first, index: 0, answered: [] };
}

function followingSection(section: SectionIdT): SectionIdT | undefined {
  const at = SECTION_ORDER.indexOf(section);
  return at < 0 ? undefined : SECTION_ORDER[at + 1];
}

/**
 * Linear advance: next slot in the section, else slot 0 of the next section
 * with the answered set carried over. Null once the last section is done.
 */
export function nextProgress(progress: ProgressT): ProgressT | null {
  const index = progress.index + 1;
  if (index < SLOTS[progress.section].length) {
    return { ...progress, index };
  }
  const next = followingSection(progress.section);
  if (!next) return null;
  return { section: next, index: 0, answered: [...progress.answered] };
}

/**
 * Rolls a cursor sitting past the end of a non-final section over to the
 * start of the next one. Cursors inside a section, and the exhausted final
 * section, are returned unchanged.
 */
export function normalizeProgress(progress: ProgressT): ProgressT {
  let current = progress;
  while (current.index >= SLOTS[current.section].length) {
    const next = followingSection(current.section);
    if (!next) break;
    current = { section: next, index: 0, answered: [...current.answered] };
  }
  return current;
}

export function currentQuestion(progress: ProgressT, segment: SegmentT | null): Question | null {
  const slots = SLOTS[progress.section];
  if (progress.index < 0 || progress.index >= slots.length) return null;
  const slot = slots[progress.index];
  if (!slot) return null;
  const text = questionText(slot, segment);
  return text ? { id: slot.id, text } : null;
}

/**
 * Number of the slot's jump keywords present in the user's text.
 */
export function scoreSlot(userText: string, slotId: string): number {
  const slot = SLOT_BY_ID.get(slotId);
  if (!slot || !userText) return 0;
  return countKeywordHits(normalizeText(userText), slot.keywords);
}

/**
 * Jumps to the highest-scoring unanswered slot after the cursor in the same
 * section (first in order on ties); falls back to the linear advance when
 * nothing scores.
 */
export function chooseNextProgress(progress: ProgressT, userText: string): ProgressT | null {
  const answered = new Set(progress.answered);
  const remaining = SLOTS[progress.section].filter(
    (slot) => slot.position >= progress.index + 1 && !answered.has(slot.id),
  );
  if (remaining.length === 0) return nextProgress(progress);

  let top: Slot | undefined;
  let topScore = 0;
  for (const slot of remaining) {
    const score = scoreSlot(userText, slot.id);
    if (score > topScore) {
      top = slot;
      topScore = score;
    }
  }
  if (top) {
    return { ...progress, index: top.position };
  }
  return nextProgress(progress);
}
