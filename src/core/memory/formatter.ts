// ═══════════════════════════════════════════════════════════════════════════════
// EVENT FORMATTER — One Line per Event for Prompt Context
// ═══════════════════════════════════════════════════════════════════════════════

import type { MemoryEvent } from './types.js';

const TEXT_LIMIT = 80;
const GENERIC_LIMIT = 60;

function stringifyData(data: Readonly<Record<string, unknown>>): string {
  try {
    return JSON.stringify(data);
  } catch {
    // Cycles and BigInts: fall back to the key list
    return `{${Object.keys(data).join(', ')}}`;
  }
}

function renderEvent(event: MemoryEvent): string {
  const { payload } = event;

  switch (payload.type) {
    case 'chat':
      return `${payload.who}: ${payload.text.slice(0, TEXT_LIMIT)}`;
    case 'vision':
      return `[vision] ${payload.summary.slice(0, TEXT_LIMIT)}`;
    case 'app_activity':
      return `[using] ${payload.app} (${payload.category})`;
    case 'location':
      return `[at] ${payload.x}, ${payload.y}, ${payload.z}`;
    case 'generic':
      return `[${event.kind}] ${stringifyData(payload.data).slice(0, GENERIC_LIMIT)}`;
  }
}

/**
 * One line per event: line breaks inside payload text become spaces so the
 * summary's line budget holds.
 */
export function formatEvent(event: MemoryEvent): string {
  return renderEvent(event).replace(/[\r\n]+/g, ' ');
}
