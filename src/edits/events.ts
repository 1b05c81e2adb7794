/**
 * Moving the final show from the current events listing to the past events archive
 */

import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

export interface EventMigration {
  /** Page listing upcoming shows */
  currentPage: string;
  /** Page listing numbered past shows */
  pastPage: string;
  /** Text that identifies the final show */
  marker: string;
  /** Text of the paragraph new past entries go before */
  pastNotice: string;
  /** Container past entries are appended to when nothing else anchors them */
  pastContainer: string;
}

export type MigrationOutcome =
  | { status: "moved"; number: number }
  | { status: "already-past" }
  | { status: "not-found" }
  | { status: "no-anchor" };

const PAST_NUMBER = /^(\d{1,4})\./;

/** The innermost paragraph holding `marker`, if any */
function findEvent($: CheerioAPI, marker: string): Cheerio<Element> | null {
  const holders = $("p").filter((_, el) => $(el).text().includes(marker));
  return holders.length > 0 ? holders.last() : null;
}

function numberedParagraphs($: CheerioAPI): { node: Cheerio<Element>; number: number }[] {
  const numbered: { node: Cheerio<Element>; number: number }[] = [];
  $("p").each((_, el) => {
    const node = $(el);
    const match = PAST_NUMBER.exec(node.text().trim());
    if (match) numbered.push({ node, number: Number(match[1]) });
  });
  return numbered;
}

/**
 * Detach the final show from `current` and file it in `past` as the next numbered
 * entry, keeping its inner markup. Nothing changes when no insertion point exists.
 */
export function migrateFinalEvent(
  current: CheerioAPI,
  past: CheerioAPI,
  migration: EventMigration,
): MigrationOutcome {
  const event = findEvent(current, migration.marker);
  if (!event) return { status: "not-found" };

  if (past.root().text().includes(migration.marker)) {
    event.remove();
    return { status: "already-past" };
  }

  const numbered = numberedParagraphs(past);
  const number = numbered.reduce((max, entry) => Math.max(max, entry.number), 0) + 1;
  const entry = `<p>${number}. ${event.html() ?? ""}</p>`;

  const notice = past("p").filter((_, el) => past(el).text().includes(migration.pastNotice));
  const lastNumbered = numbered.at(-1);
  const container = past(migration.pastContainer).first();

  if (notice.length > 0) {
    notice.last().before(entry);
  } else if (lastNumbered) {
    lastNumbered.node.after(entry);
  } else if (container.length > 0) {
    container.append(entry);
  } else {
    return { status: "no-anchor" };
  }

  event.remove();
  return { status: "moved", number };
}
