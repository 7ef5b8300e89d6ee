import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { RawRule, StyleDocument } from "../types.js";

/**
 * Reader for the slice of OGC Styled Layer Descriptor that threshold
 * styles use: Rule/Title, an ogc:Filter of PropertyIsGreaterThanOrEqualTo,
 * PropertyIsLessThan and And, and the fill/stroke CssParameters of the
 * rule's PolygonSymbolizer. Namespace prefixes are ignored. Anything the
 * reader does not understand is passed through so that parseStyleSheet()
 * can reject it.
 */

const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const COMPARISONS: Record<string, "greater_or_equal" | "less_than"> = {
  PropertyIsGreaterThanOrEqualTo: "greater_or_equal",
  PropertyIsLessThan: "less_than",
};

export function localName(el: Element): string {
  return el.name.slice(el.name.indexOf(":") + 1);
}

function children($: cheerio.CheerioAPI, el: Element, name?: string): Element[] {
  const all = $(el).children().toArray();
  return name ? all.filter((c) => localName(c) === name) : all;
}

function descendants($: cheerio.CheerioAPI, el: Element | undefined, name: string): Element[] {
  const scope = el ? $(el).find("*") : $.root().find("*");
  return scope.toArray().filter((c) => localName(c) === name);
}

function childText($: cheerio.CheerioAPI, el: Element, name: string): string | undefined {
  const [found] = children($, el, name);
  return found ? $(found).text().trim() : undefined;
}

function literal(text: string | undefined): unknown {
  if (text === undefined) return undefined;
  return NUMERIC.test(text) ? Number(text) : text;
}

function readPredicate($: cheerio.CheerioAPI, el: Element): unknown {
  const name = localName(el);
  if (name === "And") {
    return { type: "and", operands: children($, el).map((c) => readPredicate($, c)) };
  }

  const type = COMPARISONS[name];
  if (!type) {
    return { type: name };
  }
  return {
    type,
    property: childText($, el, "PropertyName"),
    threshold: literal(childText($, el, "Literal")),
  };
}

/**
 * A Filter holds exactly one expression. Several side by side (or none)
 * is passed on as a "Filter" node, which validation rejects.
 */
function readFilter($: cheerio.CheerioAPI, filter: Element): unknown {
  const parts = children($, filter);
  if (parts.length === 1) return readPredicate($, parts[0]);
  return { type: "Filter", operands: parts.map((c) => readPredicate($, c)) };
}

function cssParameters($: cheerio.CheerioAPI, symbolizer: Element): Record<string, string> {
  const params: Record<string, string> = {};
  for (const param of [
    ...descendants($, symbolizer, "CssParameter"),
    ...descendants($, symbolizer, "SvgParameter"),
  ]) {
    const name = $(param).attr("name");
    if (name) params[name] = $(param).text().trim();
  }
  return params;
}

function readRule($: cheerio.CheerioAPI, rule: Element): RawRule {
  const [filter] = children($, rule, "Filter");
  const polygons = children($, rule, "PolygonSymbolizer");
  const params = polygons.length > 0 ? cssParameters($, polygons[0]) : {};

  const raw: RawRule = {
    title: childText($, rule, "Title") || childText($, rule, "Name") || "",
    predicate: filter ? readFilter($, filter) : undefined,
    fillColor: params["fill"],
    strokeColor: params["stroke"],
    polygonSymbolizers: polygons.length,
  };
  if (params["stroke-width"] !== undefined) {
    raw.strokeWidth = literal(params["stroke-width"]);
  }
  return raw;
}

/**
 * Turn SLD text into a StyleDocument. The layer name is taken from
 * NamedLayer/Name, then UserStyle/Name, then `fallbackName`.
 */
export function readSld(xml: string, fallbackName: string): StyleDocument {
  const $ = cheerio.load(xml, { xml: true });
  const [layer] = descendants($, undefined, "NamedLayer");
  const [userStyle] = descendants($, undefined, "UserStyle");
  const name =
    (layer && childText($, layer, "Name")) || (userStyle && childText($, userStyle, "Name")) || fallbackName;

  return {
    name,
    rules: descendants($, undefined, "Rule").map((rule) => readRule($, rule)),
  };
}
