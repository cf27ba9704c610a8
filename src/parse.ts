import { load, type CheerioAPI } from "cheerio";

export type PageMeta = {
  title?: string;
  description?: string;
};

export function parsePageMeta(html: string): PageMeta {
  const $ = load(html);
  return {
    title: pickTitle($),
    description: pickDescription($),
  };
}

function pickTitle($: CheerioAPI): string | undefined {
  const candidates = [
    $("title").first().text(),
    $("meta[property='og:title']").attr("content"),
    $("h1").first().text(),
  ].map((s) => s?.replace(/\s+/g, " ").trim());

  return candidates.find((s) => !!s);
}

function pickDescription($: CheerioAPI): string | undefined {
  const candidates = [
    $("meta[name='description']").attr("content"),
    $("meta[property='og:description']").attr("content"),
  ].map((s) => s?.trim());

  return candidates.find((s) => !!s);
}
