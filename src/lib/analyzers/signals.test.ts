import { describe, expect, it } from 'vitest';
import {
  checkImageAltText, detectFaqSchema, detectMobileViewport, detectStructuredData,
  extractHeaders, extractMetadata, parsePage,
} from './signals';

function page(html: string) {
  return parsePage('https://example.com/', html);
}

describe('extractMetadata', () => {
  it('reads a collapsed, trimmed title and the meta description', () => {
    const doc = page(`
      <html><head>
        <title>
          Best Italian   Recipes
        </title>
        <meta name="description" content="Easy pasta dishes">
      </head></html>
    `);
    expect(extractMetadata(doc)).toEqual({
      title: 'Best Italian Recipes',
      description: 'Easy pasta dishes',
    });
  });

  it('treats absent and blank values as missing', () => {
    expect(extractMetadata(page('<html><head></head></html>'))).toEqual({ title: null, description: null });
    expect(extractMetadata(page('<title>   </title><meta name="description" content="  ">')))
      .toEqual({ title: null, description: null });
  });
});

describe('extractHeaders', () => {
  it('counts h1 and h2 elements', () => {
    const doc = page('<h1>A</h1><h2>B</h2><h2>C</h2>');
    expect(extractHeaders(doc)).toEqual({ h1Count: 1, h2Count: 2, h1Present: true, h2Present: true });
  });

  it('reports missing headers', () => {
    expect(extractHeaders(page('<p>text</p>'))).toEqual({ h1Count: 0, h2Count: 0, h1Present: false, h2Present: false });
  });
});

describe('structured data and FAQ detection', () => {
  it('detects any JSON-LD block', () => {
    const doc = page('<script type="application/ld+json">{"@type":"Recipe"}</script>');
    expect(detectStructuredData(doc)).toBe(true);
    expect(detectFaqSchema(doc)).toBe(false);
  });

  it('detects FAQPage by substring in the script text', () => {
    const doc = page('<script type="application/ld+json">{"@type":"FAQPage","mainEntity":[]}</script>');
    expect(detectFaqSchema(doc)).toBe(true);
  });

  it('matches FAQPage mentioned anywhere in the block', () => {
    const doc = page('<script type="application/ld+json">{"@type":"Article","about":"Not a FAQPage"}</script>');
    expect(detectFaqSchema(doc)).toBe(true);
  });

  it('ignores FAQPage outside JSON-LD scripts', () => {
    const doc = page('<p>FAQPage</p><script>var t = "FAQPage";</script>');
    expect(detectStructuredData(doc)).toBe(false);
    expect(detectFaqSchema(doc)).toBe(false);
  });
});

describe('detectMobileViewport', () => {
  it('requires a viewport meta tag', () => {
    expect(detectMobileViewport(page('<meta name="viewport" content="width=device-width">'))).toBe(true);
    expect(detectMobileViewport(page('<meta name="robots" content="index">'))).toBe(false);
  });
});

describe('checkImageAltText', () => {
  it('passes a page with zero images', () => {
    expect(checkImageAltText(page('<p>no images</p>'))).toEqual({
      allImagesHaveAlt: true,
      imageCount: 0,
      imagesWithAlt: 0,
    });
  });

  it('fails when any image lacks non-empty alt text', () => {
    const doc = page('<img src="a.jpg" alt="Pasta"><img src="b.jpg" alt="  "><img src="c.jpg">');
    expect(checkImageAltText(doc)).toEqual({
      allImagesHaveAlt: false,
      imageCount: 3,
      imagesWithAlt: 1,
    });
  });

  it('passes when every image has alt text', () => {
    const doc = page('<img src="a.jpg" alt="Pasta"><img src="b.jpg" alt="Salad">');
    expect(checkImageAltText(doc).allImagesHaveAlt).toBe(true);
  });
});
