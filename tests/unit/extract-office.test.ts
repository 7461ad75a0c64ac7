import { readFile } from "node:fs/promises";
import { beforeAll, describe, expect, it } from "vitest";
import { extractOffice } from "../../src/application/office/extract";

const section = (title: string, body: string, extra = "") =>
  `<div class="prose max-w-none"><h2>${title}</h2>${extra}<div class="whitespace-pre-line">${body}</div></div>`;

describe("extractOffice (saved page)", () => {
  let html: string;

  beforeAll(async () => {
    html = await readFile(new URL("../fixtures/office.html", import.meta.url), "utf8");
  });

  it("reads the header", () => {
    const office = extractOffice(html);
    expect(office.title).toBe("Midday Prayer");
    expect(office.subtitle).toBe("Prayers for the middle of the day & evening");
  });

  it("keeps sections in page order and ignores navigation and footer", () => {
    expect(extractOffice(html).sections.map((s) => s.title)).toEqual([
      "The Call to Prayer",
      "The Request for Presence",
      "A Reading",
      "The Concluding Prayer of the Church",
    ]);
  });

  it("extracts every section", () => {
    expect(extractOffice(html).sections).toEqual([
      {
        title: "The Call to Prayer",
        content: "O God, come to my assistance; O Lord, make haste to help me.",
        citation: "— Psalm 70:1",
      },
      {
        title: "The Request for Presence",
        content: "**Psalm 25:4**\n\nShow me your ways, O Lord, and teach me your paths.",
        citation: "— Psalm 25:4, NRSV",
      },
      {
        title: "A Reading",
        content: 'Jesus said, "Come to me." And rest.\n\nThe Word of the Lord.',
        citation: "— Matthew 11:28 | NRSV",
      },
      {
        title: "The Concluding Prayer of the Church",
        content: "Lord, you're our rest. Amen.",
        citation: undefined,
      },
    ]);
  });

  it("is idempotent", () => {
    expect(extractOffice(html)).toEqual(extractOffice(html));
  });
});

describe("extractOffice (degraded input)", () => {
  it("returns the default office for an empty page", () => {
    expect(extractOffice("")).toEqual({
      title: "The Divine Hours",
      subtitle: "",
      sections: [],
    });
  });

  it("falls back to the whole page without the main wrapper", () => {
    const office = extractOffice(`<h1>Vespers</h1>${section("The Collect", "Keep us.")}`);
    expect(office).toEqual({
      title: "Vespers",
      subtitle: "",
      sections: [{ title: "The Collect", content: "Keep us.", citation: undefined }],
    });
  });

  it("tolerates text with no markup at all", () => {
    const office = extractOffice("\u0000ÿ<<>>&&;; not html </div>");
    expect(office.title).toBe("The Divine Hours");
    expect(office.sections).toEqual([]);
  });

  it("keeps a section whose body has no content blocks", () => {
    const office = extractOffice('<div class="prose max-w-none"><h2>The Greeting</h2></div>');
    expect(office.sections).toEqual([{ title: "The Greeting", content: "", citation: undefined }]);
  });

  it("follows heading order across many sections", () => {
    const titles = ["Psalm 1", "Psalm 2", "The Small Verse", "The Refrain"];
    const office = extractOffice(titles.map((t) => section(t, t.toLowerCase())).join("\n"));
    expect(office.sections.map((s) => s.title)).toEqual(titles);
  });

  it("joins wrapped lines in verse sections too", () => {
    const office = extractOffice(section("The Hymn", "a\nb"));
    expect(office.sections[0]?.content).toBe("a b");
  });

  it("never emits three consecutive newlines", () => {
    const office = extractOffice(
      section("The Hymn", "one\n\n\n\n\ntwo<br><br><br>three", "<h3>Sub</h3>"),
    );
    expect(office.sections[0]?.content).toBe("**Sub**\n\none\n\ntwo\n\nthree");
  });

  it("decodes entities in titles, content and citations", () => {
    const office = extractOffice(
      section(
        "Morning &amp; Evening",
        "&quot;Say&quot; &lsquo;it&rsquo;&nbsp;&mdash; now",
        '<p class="text-sm text-gray-500 italic">Ps. 1&#x27;s verse</p>',
      ),
    );
    expect(office.sections[0]).toEqual({
      title: "Morning & Evening",
      content: "\"Say\" 'it' — now",
      citation: "— Ps. 1's verse",
    });
  });
});
