import { describe, it, expect } from "vitest";
import {
  formatKeywordLine,
  formatKeywordSuggestions,
  formatSearchVolume,
} from "../src/format.js";
import { MESSAGES } from "../src/messages.js";

const fullRecord = {
  keyword: "seo",
  search_volume: 1000,
  cpc: { value: 2.5, currency_code: "USD" },
  difficulty: 45,
  serp_features: ["featured_snippet", "paa"],
};

function suggestions(keywords: unknown): unknown {
  return { status: "success", data: { keywords } };
}

describe("formatKeywordSuggestions", () => {
  it("renders every field in order when extended data is requested", () => {
    expect(formatKeywordSuggestions(suggestions([fullRecord]), true)).toBe(
      "Klíčové slovo: seo | Hledanost: 1000 | CPC: 2.5 USD | Obtížnost: 45 | SERP features: featured_snippet, paa"
    );
  });

  it("omits difficulty and SERP features without extended data", () => {
    expect(formatKeywordSuggestions(suggestions([fullRecord]), false)).toBe(
      "Klíčové slovo: seo | Hledanost: 1000 | CPC: 2.5 USD"
    );
  });

  it("shows a zero search volume", () => {
    expect(
      formatKeywordSuggestions(suggestions([{ keyword: "a", search_volume: 0 }]), false)
    ).toBe("Klíčové slovo: a | Hledanost: 0");
  });

  it("leaves out absent search volume and empty cpc", () => {
    const records = [
      { keyword: "a", cpc: {} },
      { keyword: "b", cpc: null },
    ];
    expect(formatKeywordSuggestions(suggestions(records), false)).toBe(
      "Klíčové slovo: a\nKlíčové slovo: b"
    );
  });

  it("shows a present difficulty of zero but not an empty feature list", () => {
    const record = { keyword: "a", difficulty: 0, serp_features: [] };
    expect(formatKeywordSuggestions(suggestions([record]), true)).toBe(
      "Klíčové slovo: a | Obtížnost: 0"
    );
  });

  it("skips entries that are not keyword records", () => {
    const keywords = ["junk", 42, null, ["x"], { keyword: "b", search_volume: 10 }];
    expect(formatKeywordSuggestions(suggestions(keywords), true)).toBe(
      "Klíčové slovo: b | Hledanost: 10"
    );
  });

  it("keeps plain-object entries with falsy cpc or non-scalar difficulty", () => {
    const keywords = [
      { keyword: "a", search_volume: 5, cpc: 0 },
      { keyword: "b", cpc: false },
      { keyword: "c", difficulty: { score: 3 } },
    ];
    expect(formatKeywordSuggestions(suggestions(keywords), true)).toBe(
      [
        "Klíčové slovo: a | Hledanost: 5",
        "Klíčové slovo: b",
        'Klíčové slovo: c | Obtížnost: {"score":3}',
      ].join("\n")
    );
  });

  it("joins one line per keyword", () => {
    const keywords = [
      { keyword: "seo", search_volume: 1000 },
      { keyword: "seo audit", search_volume: 320 },
    ];
    expect(formatKeywordSuggestions(suggestions(keywords), false)).toBe(
      "Klíčové slovo: seo | Hledanost: 1000\nKlíčové slovo: seo audit | Hledanost: 320"
    );
  });

  it("returns the no-data message for empty or missing keywords", () => {
    expect(formatKeywordSuggestions(suggestions([]), false)).toBe(MESSAGES.noSuggestions);
    expect(formatKeywordSuggestions({ status: "success", data: {} }, false)).toBe(
      MESSAGES.noSuggestions
    );
    expect(formatKeywordSuggestions({ status: "success" }, false)).toBe(
      MESSAGES.noSuggestions
    );
  });

  it("rejects a payload without a success status", () => {
    expect(formatKeywordSuggestions({ data: { keywords: [fullRecord] } }, true)).toBe(
      MESSAGES.unexpectedFormat
    );
  });
});

describe("formatKeywordLine", () => {
  it("falls back to N/A for a missing keyword and cpc value", () => {
    expect(formatKeywordLine({ cpc: { currency_code: "CZK" } }, false)).toBe(
      "Klíčové slovo: N/A | CPC: N/A CZK"
    );
  });
});

describe("formatSearchVolume", () => {
  it("renders the full record", () => {
    const payload = {
      status: "success",
      data: [
        {
          keyword: "seo",
          search_volume: 1000,
          cpc: { value: 2.5, currency_code: "USD" },
          yoy_change: 0.0523,
          peak_month: "2024-03",
          monthly_sv: { "2024-01": 900, "2024-02": 1100 },
        },
      ],
    };

    expect(formatSearchVolume(payload)).toBe(
      [
        "Klíčové slovo: seo",
        "Hledanost: 1000",
        "CPC: 2.5 USD",
        "Meziroční změna: 5.23%",
        "Nejsilnější měsíc: 2024-03",
        "Měsíční hledanost:",
        "  - Měsíc 2024-01: 900",
        "  - Měsíc 2024-02: 1100",
      ].join("\n")
    );
  });

  it("renders only the first record", () => {
    const payload = {
      status: "success",
      data: [
        { keyword: "first", search_volume: 10 },
        { keyword: "second", search_volume: 20 },
      ],
    };
    expect(formatSearchVolume(payload)).toBe("Klíčové slovo: first\nHledanost: 10");
  });

  it("omits a falsy cpc and keeps the rest of the record", () => {
    const payload = {
      status: "success",
      data: [{ keyword: "a", search_volume: 5, cpc: false, peak_month: "2024-05" }],
    };
    expect(formatSearchVolume(payload)).toBe(
      "Klíčové slovo: a\nHledanost: 5\nNejsilnější měsíc: 2024-05"
    );
  });

  it("always shows search volume", () => {
    const payload = { status: "success", data: [{ keyword: "seo" }] };
    expect(formatSearchVolume(payload)).toBe("Klíčové slovo: seo\nHledanost: N/A");
  });

  it("shows a zero and a negative year-over-year change but not a null one", () => {
    const record = (yoy_change: number | null) => ({
      status: "success",
      data: [{ keyword: "k", search_volume: 5, yoy_change }],
    });
    expect(formatSearchVolume(record(0))).toBe(
      "Klíčové slovo: k\nHledanost: 5\nMeziroční změna: 0.00%"
    );
    expect(formatSearchVolume(record(-0.1))).toBe(
      "Klíčové slovo: k\nHledanost: 5\nMeziroční změna: -10.00%"
    );
    expect(formatSearchVolume(record(null))).toBe("Klíčové slovo: k\nHledanost: 5");
  });

  it("keeps the month order of the response", () => {
    const payload = {
      status: "success",
      data: [
        {
          keyword: "k",
          search_volume: 5,
          peak_month: "",
          monthly_sv: { "2024-12": 7, "2024-01": 3 },
        },
      ],
    };
    expect(formatSearchVolume(payload)).toBe(
      [
        "Klíčové slovo: k",
        "Hledanost: 5",
        "Měsíční hledanost:",
        "  - Měsíc 2024-12: 7",
        "  - Měsíc 2024-01: 3",
      ].join("\n")
    );
  });

  it("leaves out an empty monthly mapping", () => {
    const payload = {
      status: "success",
      data: [{ keyword: "k", search_volume: 5, monthly_sv: {} }],
    };
    expect(formatSearchVolume(payload)).toBe("Klíčové slovo: k\nHledanost: 5");
  });

  it("returns the no-data message for an empty or missing list", () => {
    expect(formatSearchVolume({ status: "success", data: [] })).toBe(MESSAGES.noVolumeData);
    expect(formatSearchVolume({ status: "success" })).toBe(MESSAGES.noVolumeData);
  });

  it("reports an unexpected format when the first entry is not a record", () => {
    expect(formatSearchVolume({ status: "success", data: ["seo"] })).toBe(
      MESSAGES.unexpectedFormat
    );
  });
});
