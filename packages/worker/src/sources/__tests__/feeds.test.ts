import { describe, it, expect } from "vitest";
import { RssFeedProducer } from "../rss.js";
import { PaperFeedProducer } from "../paper.js";
import { stripHtml } from "../http.js";
import {
  createFakeFetch,
  createTestLogger,
  xmlResponse,
} from "../../__tests__/helpers.js";

const since = new Date("2025-06-01T00:00:00.000Z");

interface TestItem {
  title: string;
  link?: string;
  pubDate?: string;
  description?: string;
}

function rss(items: TestItem[]): string {
  const body = items
    .map(
      (item) =>
        "<item>" +
        `<title>${item.title}</title>` +
        (item.link ? `<link>${item.link}</link>` : "") +
        (item.pubDate ? `<pubDate>${item.pubDate}</pubDate>` : "") +
        (item.description
          ? `<description><![CDATA[${item.description}]]></description>`
          : "") +
        "</item>",
    )
    .join("");
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    '<rss version="2.0"><channel><title>Test</title>' +
    "<link>https://feeds.example.com</link><description>Test feed</description>" +
    `${body}</channel></rss>`
  );
}

describe("stripHtml", () => {
  it("removes tags, decodes common entities and collapses whitespace", () => {
    expect(stripHtml("<p>Fast &amp; small</p>\n\n<b>model</b>&nbsp;")).toBe(
      "Fast & small model",
    );
  });

  it("keeps words apart where a tag separated them", () => {
    expect(stripHtml("first line<br>second<br/>third")).toBe(
      "first line second third",
    );
  });

  it("decodes an escaped entity only once", () => {
    expect(stripHtml("use &amp;lt;think&amp;gt; tags")).toBe(
      "use &lt;think&gt; tags",
    );
    expect(stripHtml("&quot;open&quot; &#39;weights&#039;")).toBe(
      "\"open\" 'weights'",
    );
  });
});

describe("RssFeedProducer", () => {
  const feed = {
    name: "Lab Blog",
    url: "https://lab.example.com/feed.xml",
    category: "llm" as const,
  };

  it("keeps dated entries newer than the window start", async () => {
    const fetchFn = createFakeFetch({
      [feed.url]: () =>
        xmlResponse(
          rss([
            {
              title: "New model",
              link: "https://lab.example.com/new-model",
              pubDate: "Mon, 02 Jun 2025 08:00:00 GMT",
              description: "<p>We trained a <b>new</b> model</p>",
            },
            {
              title: "Old post",
              link: "https://lab.example.com/old",
              pubDate: "Mon, 26 May 2025 08:00:00 GMT",
            },
            { title: "Undated", link: "https://lab.example.com/undated" },
          ]),
        ),
    });
    const producer = new RssFeedProducer(
      { feeds: [feed] },
      { logger: createTestLogger().logger, fetchFn },
    );

    const records = await producer.fetch(since);

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      title: "New model",
      url: "https://lab.example.com/new-model",
      source: "Lab Blog",
      source_type: "rss",
      category: "llm",
      published_at: "2025-06-02T08:00:00.000Z",
      content: "We trained a new model",
      extra: { feed_category: "llm" },
    });
  });

  it("rejects when every feed fails", async () => {
    const producer = new RssFeedProducer(
      { feeds: [feed] },
      { logger: createTestLogger().logger, fetchFn: createFakeFetch({}) },
    );
    await expect(producer.fetch(since)).rejects.toThrow("All 1 RSS feeds failed");
  });
});

describe("PaperFeedProducer", () => {
  const feedA = { name: "arXiv cs.AI", url: "https://rss.example.org/cs.AI" };
  const feedB = { name: "arXiv cs.CL", url: "https://rss.example.org/cs.CL" };
  const date = "Tue, 03 Jun 2025 04:00:00 GMT";

  it("takes an even share per feed and dedupes cross-listed papers", async () => {
    const fetchFn = createFakeFetch({
      [feedA.url]: () =>
        xmlResponse(
          rss([
            { title: "Paper one", link: "https://arxiv.org/abs/1", pubDate: date },
            { title: "Paper two", link: "https://arxiv.org/abs/2", pubDate: date },
          ]),
        ),
      [feedB.url]: () =>
        xmlResponse(
          rss([
            { title: "Paper one", link: "https://arxiv.org/abs/1", pubDate: date },
            { title: "Paper three", link: "https://arxiv.org/abs/3", pubDate: date },
          ]),
        ),
    });
    const producer = new PaperFeedProducer(
      { feeds: [feedA, feedB], topN: 3 },
      { logger: createTestLogger().logger, fetchFn },
    );

    const records = await producer.fetch(since);

    expect(records.map((r) => r.url)).toEqual([
      "https://arxiv.org/abs/1",
      "https://arxiv.org/abs/3",
    ]);
    expect(records[1]).toMatchObject({
      source: "arXiv cs.CL",
      source_type: "paper",
      category: "paper",
      extra: { feed: "arXiv cs.CL" },
    });
  });

  it("keeps going when one feed fails", async () => {
    const fetchFn = createFakeFetch({
      [feedB.url]: () =>
        xmlResponse(
          rss([
            { title: "Paper three", link: "https://arxiv.org/abs/3", pubDate: date },
          ]),
        ),
    });
    const producer = new PaperFeedProducer(
      { feeds: [feedA, feedB] },
      { logger: createTestLogger().logger, fetchFn },
    );
    expect((await producer.fetch(since)).map((r) => r.title)).toEqual([
      "Paper three",
    ]);
  });
});
