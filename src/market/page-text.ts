import * as cheerio from "cheerio";

/**
 * Load HTML with a space appended to every element, so `.text()` keeps
 * adjacent cells apart ("2019" + "$9.990.000" must not read "2019$9.990.000").
 */
export function loadSpaced(html: string): cheerio.CheerioAPI {
  const $ = cheerio.load(html || "");
  $("script, style, noscript, template").remove();
  $("*").append(" ");
  return $;
}

/** Visible text of an HTML page, whitespace collapsed. */
export function pageText(html: string): string {
  return loadSpaced(html).root().text().replace(/\s+/g, " ").trim();
}
