import { BOOT_DATA_ID, isBootLine, type BootLine } from '../utils/bootLine';
import type { Segment, SequenceView } from './sequencer';

const PENDING = 'segment-pending';
const TYPING = 'typing';

const requireElement = (doc: Document, id: string): HTMLElement => {
  const element = doc.getElementById(id);
  if (!element) throw new Error(`page is missing #${id}`);
  return element;
};

/** Boot log the server embedded as JSON. */
export const readBootLog = (doc: Document): BootLine[] => {
  const raw: unknown = JSON.parse(requireElement(doc, BOOT_DATA_ID).textContent ?? '[]');
  if (!Array.isArray(raw) || !raw.every(isBootLine)) {
    throw new Error(`#${BOOT_DATA_ID} does not hold a boot log`);
  }
  return raw;
};

export interface DomView {
  view: SequenceView;
  segments: Segment[];
}

/**
 * Hides every `[data-segment]` element and returns a view that brings them
 * back in document order. `type` segments are emptied and refilled one
 * character at a time.
 */
export const createDomView = (doc: Document): DomView => {
  const bootLog = requireElement(doc, 'boot-log');
  const overlay = requireElement(doc, 'boot-sequence');
  const main = requireElement(doc, 'main-content');

  const elements = Array.from(doc.querySelectorAll<HTMLElement>('[data-segment]'));
  const texts = elements.map((element) => element.textContent ?? '');
  const segments = elements.map((element, index): Segment => ({
    mode: element.dataset.segment === 'type' ? 'type' : 'line',
    length: texts[index].length,
  }));

  // Typed segments are emptied before the outer lines that contain them show.
  elements.forEach((element, index) => {
    element.classList.add(PENDING);
    if (segments[index].mode === 'type') element.textContent = '';
  });

  const view: SequenceView = {
    showBootLine(line) {
      const div = doc.createElement('div');
      div.className = `line boot-${line.tone}`;
      div.textContent = line.text;
      bootLog.appendChild(div);
    },
    finishBoot() {
      overlay.classList.add('hidden');
      main.style.opacity = '1';
    },
    revealSegment(index, visibleChars) {
      const element = elements[index];
      element.classList.remove(PENDING);
      if (segments[index].mode !== 'type') return;
      element.textContent = texts[index].slice(0, visibleChars);
      element.classList.toggle(TYPING, visibleChars < texts[index].length);
    },
    finishReveal() {
      main.dataset.revealed = 'true';
    },
  };

  return { view, segments };
};
