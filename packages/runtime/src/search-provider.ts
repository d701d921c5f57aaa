import { z } from "zod";
import { WayfarerError } from "@wayfarer/types";

export interface SearchDocument {
  title: string;
  url: string;
  summary: string;
  text: string;
}

export interface SearchProvider {
  readonly name: string;
  search(query: string): Promise<SearchDocument[]>;
}

const ExaResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().nullish(),
      url: z.string(),
      summary: z.string().nullish(),
      text: z.string().nullish(),
    })
  ),
});

export interface ExaSearchOptions {
  numResults?: number;
  maxCharacters?: number;
  baseUrl?: string;
}

/**
 * Web search over the Exa REST API. Requests page text and an AI summary
 * per hit so specialists can read prices and timetables off the page.
 */
export class ExaSearchProvider implements SearchProvider {
  readonly name = "exa";
  private readonly numResults: number;
  private readonly maxCharacters: number;
  private readonly baseUrl: string;

  constructor(private readonly apiKey: string, options: ExaSearchOptions = {}) {
    if (!apiKey) throw new WayfarerError("CONFIG_INVALID", "Exa API key is required");
    this.numResults = options.numResults ?? 3;
    this.maxCharacters = options.maxCharacters ?? 5000;
    this.baseUrl = options.baseUrl ?? "https://api.exa.ai";
  }

  async search(query: string): Promise<SearchDocument[]> {
    const response = await fetch(`${this.baseUrl}/search`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
      },
      body: JSON.stringify({
        query: enhanceQuery(query),
        type: "auto",
        numResults: this.numResults,
        contents: {
          text: { maxCharacters: this.maxCharacters, includeHtmlTags: false },
          summary: true,
        },
      }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new WayfarerError("SEARCH_ERROR", `Exa API error ${response.status}: ${errorText}`);
    }

    const parsed = ExaResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new WayfarerError("SEARCH_ERROR", "Exa API returned an unexpected body", parsed.error);
    }

    return parsed.data.results.map((r) => ({
      title: r.title ?? "No Title",
      url: r.url,
      summary: r.summary ?? "No summary available.",
      text: r.text ?? "",
    }));
  }
}

/**
 * Returns fixed documents. Used when no search key is configured and in tests.
 */
export class StaticSearchProvider implements SearchProvider {
  readonly name = "static";
  readonly queries: string[] = [];

  constructor(private readonly documents: SearchDocument[]) {}

  async search(query: string): Promise<SearchDocument[]> {
    this.queries.push(query);
    return this.documents;
  }
}

/** Flight and train queries without "price" get schedule terms appended. */
export function enhanceQuery(query: string): string {
  const lower = query.toLowerCase();
  if ((lower.includes("flight") || lower.includes("train")) && !lower.includes("price")) {
    return `${query} price schedule ticket table`;
  }
  return query;
}

const PREVIEW_CHARS = 2000;

/** Dense plain-text rendering of search hits for a specialist prompt. */
export function formatSearchDocuments(documents: SearchDocument[]): string {
  if (documents.length === 0) return "No results found.";

  return documents
    .map((doc, i) => {
      const preview = doc.text ? doc.text.slice(0, PREVIEW_CHARS).replace(/\n\n/g, "\n").trim() : "No text content.";
      return [
        `=== OPTION ${i + 1} ===`,
        `SOURCE: ${doc.title}`,
        `LINK: ${doc.url}`,
        `SUMMARY: ${doc.summary}`,
        `PAGE CONTENT:`,
        preview,
      ].join("\n");
    })
    .join("\n\n");
}
