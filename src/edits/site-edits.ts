/**
 * The fixed edit list that turns the archived site into its published form
 */

import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";
import { ownTextIncludes, textIs } from "./apply.js";
import type { EditorTemplates } from "./templates.js";
import type { PageEdit } from "./types.js";
import type { EventMigration } from "./events.js";

export const CLOSING_MESSAGE =
  "Charm City Art Space held its last show in November of 2015. " +
  "If you would like to contribute to a community arts space in Baltimore, " +
  'please consider <a href="https://theundercroft.org/">The Undercroft</a>.';

export const INJECTION_POINT = '<div id="newContent"></div>';

export const FINAL_EVENT: EventMigration = {
  currentPage: "events.html",
  pastPage: "past.html",
  marker: "LAST SHOW AT 1731 MARYAND AVE",
  pastNotice: "NOTICE: DUE TO UNFORSEEN",
  pastContainer: ".text",
};

function attrMatches(attr: string, pattern: RegExp): (node: Cheerio<Element>) => boolean {
  return (node) => pattern.test(node.attr(attr) ?? "");
}

const EAT_HREF = /(?:^|\/)eats?(?:\.html|\.php|\/|$)/i;

export function buildSiteEdits(templates: EditorTemplates): PageEdit[] {
  return [
    // donations
    {
      kind: "remove",
      label: "PayPal/donate link",
      target: { selector: "a[href]", where: attrMatches("href", /paypal|donate/i) },
    },
    {
      kind: "remove",
      label: "PayPal form",
      target: { selector: "form[action]", where: attrMatches("action", /paypal/i) },
    },
    {
      kind: "remove",
      label: "PayPal image",
      target: {
        selector: "img",
        where: (node) =>
          /paypal/i.test(node.attr("src") ?? "") || /paypal|donate/i.test(node.attr("alt") ?? ""),
        climb: "a",
      },
    },
    {
      kind: "remove",
      label: "PayPal/donate block",
      target: {
        selector: "[class], [id]",
        where: (node) => /paypal|donate/i.test(`${node.attr("class") ?? ""} ${node.attr("id") ?? ""}`),
      },
    },
    {
      kind: "remove",
      label: "PayPal donate button",
      target: {
        selector: "a, button, input",
        where: (node) => {
          const text = node.text().toLowerCase();
          return text.includes("donate") && text.includes("paypal");
        },
      },
    },

    // navigation
    {
      kind: "remove",
      label: "Eats link",
      target: {
        selector: "a",
        where: (node) => textIs("eat", "eats")(node) || EAT_HREF.test(node.attr("href") ?? ""),
        climb: "li",
      },
    },
    {
      kind: "remove",
      label: "Eats item",
      target: { selector: "li, span", where: textIs("eat", "eats") },
    },

    // wording
    {
      kind: "substitute",
      label: "'is' -> 'was'",
      pattern: /Charm City Art Space is\b/gi,
      replacement: "Charm City Art Space was",
    },
    {
      kind: "substitute",
      label: "Appreciation text",
      pattern: /Anything you can give is appreciated\.?\s*We need your help to keep us going\.?/gi,
      replacement: "",
      prune: true,
    },
    {
      kind: "replace",
      label: "Donation request",
      target: { selector: "body *", where: ownTextIncludes("Make a general donation to CCAS") },
      html: CLOSING_MESSAGE,
    },
    {
      kind: "replace",
      label: "Donation container",
      target: {
        selector: "div, p, section, aside",
        where: (node) => {
          const text = node.text();
          return text.includes("Make a general donation to CCAS") && text.includes("keep us going");
        },
      },
      html: `<p>${CLOSING_MESSAGE}</p>`,
    },

    // responsive layout
    {
      kind: "insert",
      label: "Viewport meta",
      anchors: [{ target: { selector: "head" }, position: "prepend" }],
      html: '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
      unless: 'meta[name="viewport"]',
    },
    {
      kind: "insert",
      label: "Responsive CSS",
      anchors: [{ target: { selector: "head" }, position: "append" }],
      html: `<style id="responsive-style">\n${templates.responsiveCss}</style>`,
      unless: "#responsive-style",
    },
    {
      kind: "insert",
      label: "Hamburger button",
      anchors: [
        { target: { selector: "#header" }, position: "append" },
        { target: { selector: "#menu" }, position: "before" },
      ],
      html: '<button id="hamburger-btn" aria-label="Menu" type="button">☰</button>',
      requires: "#menu",
      unless: "#hamburger-btn",
    },
    {
      kind: "insert",
      label: "Hamburger script",
      anchors: [{ target: { selector: "body" }, position: "append" }],
      html: `<script id="hamburger-script">\n${templates.hamburgerScript}</script>`,
      requires: "#menu",
      unless: "#hamburger-script",
    },
    {
      kind: "insert",
      label: "Mobile banner",
      anchors: [{ target: { selector: "#menu" }, position: "after" }],
      html: `<div id="mobile-banner">${CLOSING_MESSAGE}</div>`,
      requires: "#menu",
      unless: "#mobile-banner",
    },

    // content injection points
    {
      kind: "insert",
      label: "Injection point",
      pages: ["index.html"],
      anchors: [
        {
          target: {
            selector: "div",
            where: ownTextIncludes("from all over to showcase their work in our fine city."),
          },
          position: "after",
        },
      ],
      html: INJECTION_POINT,
      unless: "#newContent",
    },
    {
      kind: "insert",
      label: "Injection point",
      pages: ["events.html"],
      anchors: [
        {
          target: { selector: "div.blurb", where: (node) => /gallery\s+schedule/i.test(node.text()) },
          position: "after",
        },
      ],
      html: INJECTION_POINT,
      unless: "#newContent",
    },
  ];
}
