import type { Comment, Depth, ScrapedRecord } from "./models";

export const STAGE_NAMES: Readonly<Record<Depth, string>> = {
  0: "LINKS_ONLY",
  1: "METADATA",
  2: "DISCUSSION",
  3: "DISCUSSION_META",
};

export const ALLOWED_TRANSITIONS: ReadonlyMap<Depth, Depth[]> = new Map<Depth, Depth[]>([
  [0, [1]],
  [1, [2]],
  [2, [3]],
  [3, []],
]);

export function canTransition(from: Depth, to: Depth): boolean {
  const allowed = ALLOWED_TRANSITIONS.get(from);
  return allowed?.includes(to) ?? false;
}

export function validateTransition(from: Depth, to: Depth): void {
  if (!canTransition(from, to)) {
    throw new Error(
      `Invalid depth transition: ${STAGE_NAMES[from]} -> ${STAGE_NAMES[to]}. Allowed: ${
        ALLOWED_TRANSITIONS.get(from)?.map((d) => STAGE_NAMES[d]).join(", ") || "none"
      }`
    );
  }
}

/** Stages a run at `depth` walks through, in order, starting at LINKS_ONLY. */
export function stagesUpTo(depth: Depth): Depth[] {
  const stages: Depth[] = [0];
  let current: Depth = 0;
  while (current < depth) {
    const next: Depth | undefined = ALLOWED_TRANSITIONS.get(current)?.[0];
    if (next === undefined) break;
    stages.push(next);
    current = next;
  }
  return stages;
}

function gateComment(comment: Comment, stage: Depth): Comment {
  if (stage >= 3) {
    return {
      text: comment.text,
      ...(comment.author !== undefined && { author: comment.author }),
      ...(comment.postedAt !== undefined && { postedAt: comment.postedAt }),
      ...(comment.likes !== undefined && { likes: comment.likes }),
    };
  }
  return { text: comment.text };
}

/**
 * Strips every field a record is not entitled to at `stage`. The result
 * carries `completedStage = stage`.
 */
export function applyDepthGate(record: ScrapedRecord, stage: Depth): ScrapedRecord {
  const gated: ScrapedRecord = {
    searchTerm: record.searchTerm,
    url: record.url,
    platform: record.platform,
    rank: record.rank,
    scrapedAt: record.scrapedAt,
    hasComments: false,
    comments: [],
    completedStage: stage,
  };

  if (stage >= 1) {
    if (record.title !== undefined) gated.title = record.title;
    if (record.author !== undefined) gated.author = record.author;
    if (record.date !== undefined) gated.date = record.date;
    if (record.publisher !== undefined) gated.publisher = record.publisher;
    if (record.excerpt !== undefined) gated.excerpt = record.excerpt;
    if (record.summary !== undefined) gated.summary = record.summary;
  }

  if (stage >= 2) {
    gated.hasComments = record.hasComments;
    gated.comments = record.comments.map((c) => gateComment(c, stage));
  }

  return gated;
}
