import { z } from "zod";
import { price, type PriceTerms } from "@paywire/pricing";

// ---------------------------------------------------------------------------
// Tool catalogue
//
// Each tool is a thin pass-through to one Serper endpoint.  Prices live
// beside the tool definitions and are collected into the PriceRegistry at
// startup; a tool without a price stops the gateway from booting.
// ---------------------------------------------------------------------------

const IATP_TOKEN = "0x3e17730bb2ca51a8D5deD7E44c003A2e95a4d822";

/** 1e-05 tokens at 6 decimals. */
const SEARCH_PRICE = price()
  .costs("10000000000000")
  .asset(IATP_TOKEN, 6)
  .on("sepolia")
  .domain("IATPWallet", "1")
  .build();

export const serperQueryShape = {
  q: z.string().min(1).describe('Search query string, e.g. "openai company"'),
  gl: z.string().optional().describe('Country code for results, e.g. "us"'),
  hl: z.string().optional().describe('Language / locale code, e.g. "en"'),
  location: z.string().optional().describe('Geographic location, e.g. "Lagos, Nigeria"'),
  autocorrect: z.boolean().default(false).describe("Enable Google's autocorrect"),
  num: z.number().optional().describe("Number of results to return"),
  page: z.number().optional().describe("Page number for pagination"),
};

export const serperQuery = z.object(serperQueryShape);

export type SerperQuery = z.infer<typeof serperQuery>;

export interface ToolDefinition {
  id: string;
  description: string;
  /** Upstream path, relative to the upstream base URL. */
  endpoint: string;
  price?: PriceTerms;
}

export const TOOLS: readonly ToolDefinition[] = [
  {
    id: "serper_search",
    description:
      "Perform a Google web search using Serper. Returns high-level structured SERP signals such as knowledge graph and answer boxes.",
    endpoint: "/search",
    price: SEARCH_PRICE,
  },
  {
    id: "serper_news",
    description:
      "Perform a Google News search using Serper. Returns structured news article metadata.",
    endpoint: "/news",
    price: SEARCH_PRICE,
  },
  {
    id: "serper_scholar",
    description:
      "Perform a Google Scholar search using Serper. Returns structured academic metadata.",
    endpoint: "/scholar",
    price: SEARCH_PRICE,
  },
];
