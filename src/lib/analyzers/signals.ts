import * as cheerio from 'cheerio';
import { AccessibilityFacts, HeaderFacts, MetadataFacts } from '../types';

export interface PageDocument {
  url: string;
  html: string;
  $: cheerio.CheerioAPI;
}

const JSON_LD_SELECTOR = 'script[type="application/ld+json"]';

export function parsePage(url: string, html: string): PageDocument {
  return { url, html, $: cheerio.load(html) };
}

function presentOrNull(value: string | undefined): string | null {
  const trimmed = value?.replace(/\s+/g, ' ').trim();
  return trimmed ? trimmed : null;
}

export function extractMetadata(doc: PageDocument): MetadataFacts {
  const { $ } = doc;
  const titleEl = $('title').first();
  return {
    title: titleEl.length ? presentOrNull(titleEl.text()) : null,
    description: presentOrNull($('meta[name="description"]').first().attr('content')),
  };
}

export function extractHeaders(doc: PageDocument): HeaderFacts {
  const h1Count = doc.$('h1').length;
  const h2Count = doc.$('h2').length;
  return { h1Count, h2Count, h1Present: h1Count > 0, h2Present: h2Count > 0 };
}

export function detectStructuredData(doc: PageDocument): boolean {
  return doc.$(JSON_LD_SELECTOR).length > 0;
}

// Raw substring match on the script body, not a JSON parse: a block that only
// mentions "FAQPage" in a string value still counts.
export function detectFaqSchema(doc: PageDocument): boolean {
  const { $ } = doc;
  return $(JSON_LD_SELECTOR)
    .toArray()
    .some(el => ($(el).html() || '').includes('FAQPage'));
}

export function detectMobileViewport(doc: PageDocument): boolean {
  return doc.$('meta[name="viewport"]').length > 0;
}

export function checkImageAltText(doc: PageDocument): AccessibilityFacts {
  const { $ } = doc;
  const images = $('img').toArray();
  const imagesWithAlt = images.filter(el => ($(el).attr('alt') || '').trim().length > 0).length;
  return {
    allImagesHaveAlt: imagesWithAlt === images.length,
    imageCount: images.length,
    imagesWithAlt,
  };
}
