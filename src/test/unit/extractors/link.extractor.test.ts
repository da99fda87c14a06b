import { describe, expect, it } from "vitest";
import { LinkExtractor, matchKnownHost } from "../../../scraping/extractors/link.extractor";
import { parseDocument } from "../../../scraping/parsers/html-document";
import { BASE_ORIGIN, VIKING_PAGE_HTML } from "../../helpers/fixtures";

const PAGE_URL = "https://vik1ngfile.site/f/abc123";

function extract(html: string) {
  return new LinkExtractor(BASE_ORIGIN).extract(parseDocument(html), PAGE_URL);
}

describe("LinkExtractor", () => {
  describe("explicit download affordances", () => {
    it("normalizes a relative download link against the base origin", () => {
      const links = extract(`<a href="/d/abc">Download</a>`);

      expect(links).toEqual([{ url: "https://vik1ngfile.site/d/abc", source: "viking" }]);
      expect(links[0].quality).toBeUndefined();
    });

    it("infers quality from the element text", () => {
      const links = extract(`<a href="get/2">DOWNLOAD 720p</a>`);

      expect(links).toEqual([
        { url: "https://vik1ngfile.site/get/2", quality: "720p", source: "viking" },
      ]);
    });

    it("ignores download text on elements without an href", () => {
      expect(extract(`<button>Download</button>`)).toEqual([]);
    });
  });

  describe("known-host links", () => {
    it("names the source after the host with .com stripped", () => {
      const links = extract(`<a href="https://drive.google.com/file/d/X">Open</a>`);

      expect(links).toEqual([{ url: "https://drive.google.com/file/d/X", source: "drive.google" }]);
    });

    it("strips .nz from mega.nz", () => {
      const links = extract(`<a href="https://mega.nz/file/AbC">Mirror</a>`);

      expect(links).toEqual([{ url: "https://mega.nz/file/AbC", source: "mega" }]);
    });

    it("matches hosts case-insensitively but keeps the raw href", () => {
      const links = extract(`<a href="https://PixelDrain.com/u/1">Mirror</a>`);

      expect(links).toEqual([{ url: "https://PixelDrain.com/u/1", source: "pixeldrain" }]);
    });

    it("does not normalize relative hrefs", () => {
      const links = extract(`<a href="/go/hubcloud/42">Mirror</a>`);

      expect(links).toEqual([{ url: "/go/hubcloud/42", source: "hubcloud" }]);
    });
  });

  describe("inline pattern scan", () => {
    it("finds bare media URLs in text", () => {
      const links = extract(`<p>Mirror: https://cdn.example/movie_1080p.mp4</p>`);

      expect(links).toEqual([
        {
          url: "https://cdn.example/movie_1080p.mp4",
          quality: "1080p",
          source: "direct",
          fileType: "mp4",
        },
      ]);
    });

    it("finds URLs inside inline scripts", () => {
      const links = extract(
        `<script>var src = "https://media.example/stream/index.m3u8";</script>`
      );

      expect(links).toEqual([
        { url: "https://media.example/stream/index.m3u8", source: "direct", fileType: "m3u8" },
      ]);
    });

    it("decodes entities in URLs found in attributes", () => {
      const links = extract(`<div data-src="https://cdn.example/dl/get?id=1&t=2"></div>`);

      expect(links).toEqual([{ url: "https://cdn.example/dl/get?id=1&t=2", source: "direct" }]);
    });

    it("finds /download/ and /dl/ paths after media URLs", () => {
      const links = extract(`
        <p>https://files.example/dl/abc</p>
        <p>https://files.example/download/xyz</p>
        <p>https://files.example/clip.webm</p>
      `);

      expect(links.map((l) => l.url)).toEqual([
        "https://files.example/clip.webm",
        "https://files.example/download/xyz",
        "https://files.example/dl/abc",
      ]);
      expect(links.every((l) => l.source === "direct")).toBe(true);
    });
  });

  describe("deduplication", () => {
    it("keeps the metadata of the first strategy to find a URL", () => {
      const links = extract(`<a href="https://pixeldrain.com/u/abc">Download 720p</a>`);

      expect(links).toEqual([
        { url: "https://pixeldrain.com/u/abc", quality: "720p", source: "viking" },
      ]);
    });

    it("does not re-add a known-host link found again by the inline scan", () => {
      const links = extract(`<a href="https://mega.nz/folder/download/x">Mirror</a>`);

      expect(links).toEqual([{ url: "https://mega.nz/folder/download/x", source: "mega" }]);
    });

    it("does not re-add a link whose query string is entity-encoded in the markup", () => {
      const links = extract(`<a href="https://pixeldrain.com/download/x?a=1&amp;b=2">Mirror</a>`);

      expect(links).toEqual([
        { url: "https://pixeldrain.com/download/x?a=1&b=2", source: "pixeldrain" },
      ]);
    });

    it("compares URLs as exact strings", () => {
      const links = extract(`
        <a href="https://pixeldrain.com/u/abc">Mirror</a>
        <a href="https://PIXELDRAIN.com/u/abc">Mirror</a>
      `);

      expect(links).toHaveLength(2);
    });
  });

  it("returns links in strategy order", () => {
    const links = extract(VIKING_PAGE_HTML);

    expect(links).toEqual([
      { url: "https://vik1ngfile.site/d/abc123", quality: "1080p", source: "viking" },
      { url: "https://pixeldrain.com/u/pd123", source: "pixeldrain" },
      {
        url: "https://cdn.example/files/sample_720p.mp4",
        quality: "720p",
        source: "direct",
        fileType: "mp4",
      },
    ]);
  });

  it("returns frozen links", () => {
    const [link] = extract(`<a href="/d/abc">Download</a>`);
    expect(Object.isFrozen(link)).toBe(true);
  });

  it.each(["", "<a href=", "<<<>>>", "<html><body></body></html>"])(
    "yields nothing for %j without throwing",
    (html) => {
      expect(extract(html)).toEqual([]);
    }
  );
});

describe("matchKnownHost", () => {
  it("returns the first host in list order", () => {
    expect(matchKnownHost("https://gdtot.example/hubcloud/1")).toBe("gdtot");
  });

  it("returns undefined for unknown hosts", () => {
    expect(matchKnownHost("https://example.com/file")).toBeUndefined();
  });
});
