/**
 * Execution of declarative page edits against a parsed document
 */

import type { Cheerio, CheerioAPI } from "cheerio";
import { type Element, isTag, isText, type Text } from "domhandler";
import type {
  EditCount,
  InsertEdit,
  NodeTarget,
  PageEdit,
  RemoveEdit,
  ReplaceEdit,
  SubstituteEdit,
} from "./types.js";

/** Elements whose direct text contains `phrase` */
export function ownTextIncludes(phrase: string): (node: Cheerio<Element>) => boolean {
  return (node) =>
    node
      .contents()
      .toArray()
      .some((child) => isText(child) && child.data.includes(phrase));
}

/** Elements whose full text, trimmed and lower-cased, is one of `words` */
export function textIs(...words: string[]): (node: Cheerio<Element>) => boolean {
  return (node) => words.includes(node.text().trim().toLowerCase());
}

/**
 * Resolve a target to distinct elements, in document order
 */
export function selectTargets($: CheerioAPI, target: NodeTarget): Element[] {
  const picked = new Set<Element>();
  for (const el of $(target.selector).toArray().filter(isTag)) {
    const $el = $(el);
    if (target.where && !target.where($el)) continue;
    const parent = $el.parent();
    const parentEl = parent.get(0);
    if (target.climb && parentEl && isTag(parentEl) && parent.is(target.climb)) {
      picked.add(parentEl);
    } else {
      picked.add(el);
    }
  }
  return [...picked];
}

function applyRemove($: CheerioAPI, edit: RemoveEdit): number {
  const nodes = selectTargets($, edit.target);
  for (const node of nodes) $(node).remove();
  return nodes.length;
}

function applyReplace($: CheerioAPI, edit: ReplaceEdit): number {
  const nodes = selectTargets($, edit.target);
  for (const node of nodes) $(node).html(edit.html);
  return nodes.length;
}

function applyInsert($: CheerioAPI, edit: InsertEdit): number {
  if (edit.requires && $(edit.requires).length === 0) return 0;
  if (edit.unless && $(edit.unless).length > 0) return 0;
  for (const anchor of edit.anchors) {
    const [node] = selectTargets($, anchor.target);
    if (!node) continue;
    const $node = $(node);
    switch (anchor.position) {
      case "before":
        $node.before(edit.html);
        break;
      case "after":
        $node.after(edit.html);
        break;
      case "prepend":
        $node.prepend(edit.html);
        break;
      case "append":
        $node.append(edit.html);
        break;
    }
    return 1;
  }
  return 0;
}

function textNodes($: CheerioAPI): Text[] {
  const nodes: Text[] = [];
  $.root()
    .find("*")
    .not("script, style")
    .contents()
    .each((_, node) => {
      if (isText(node)) nodes.push(node);
    });
  return nodes;
}

function applySubstitute($: CheerioAPI, edit: SubstituteEdit): number {
  const flags = edit.pattern.flags.includes("g") ? edit.pattern.flags : `${edit.pattern.flags}g`;
  const pattern = new RegExp(edit.pattern.source, flags);
  let count = 0;
  for (const node of textNodes($)) {
    const matches = node.data.match(pattern);
    if (!matches) continue;
    count += matches.length;
    const next = node.data.replace(pattern, edit.replacement);
    if (!edit.prune) {
      node.data = next;
      continue;
    }
    if (next.trim()) {
      node.data = next.trim();
      continue;
    }
    const parent = node.parent;
    $(node).remove();
    if (parent && isTag(parent) && !$(parent).is("html, head, body") && !$(parent).text().trim()) {
      $(parent).remove();
    }
  }
  return count;
}

export function appliesTo(edit: PageEdit, page: string): boolean {
  return !edit.pages || edit.pages.includes(page);
}

export function applyEdit($: CheerioAPI, edit: PageEdit): number {
  switch (edit.kind) {
    case "remove":
      return applyRemove($, edit);
    case "replace":
      return applyReplace($, edit);
    case "insert":
      return applyInsert($, edit);
    case "substitute":
      return applySubstitute($, edit);
  }
}

/**
 * Apply `edits` in order to the document of `page`.
 * An edit whose target is missing counts zero and changes nothing.
 */
export function applyEdits(
  $: CheerioAPI,
  edits: readonly PageEdit[],
  page: string,
): EditCount[] {
  return edits
    .filter((edit) => appliesTo(edit, page))
    .map((edit) => ({ label: edit.label, count: applyEdit($, edit) }));
}
