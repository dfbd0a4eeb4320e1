import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { GoogleGenerativeAI } from "@google/generative-ai";
import type { Part } from "@google/generative-ai";
import mammoth from "mammoth";
import { z } from "zod";
import { CollaboratorError, describeError } from "@provider-verify/contracts";
import type { ProviderClaim } from "@provider-verify/contracts";

/**
 * Configuration for Gemini client
 */
export interface GeminiConfig {
  apiKey: string;
  model?: string;
  /** Attempts per document (default: 3) */
  maxAttempts?: number;
  /** Pause between attempts in milliseconds (default: 2000) */
  retryDelayMs?: number;
}

/** Binary document types sent inline, by file extension */
const INLINE_MIME_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".heic": "image/heic",
  ".pdf": "application/pdf",
};

const TEXT_EXTENSIONS = new Set([".txt", ".md"]);

const WORD_EXTENSION = ".docx";

const optionalField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return undefined;
    const text = String(value).trim();
    return text || undefined;
  });

const ClaimResponseSchema = z.object({
  provider_name: optionalField,
  npi_number: optionalField,
  address_raw: optionalField,
  phone: optionalField,
  website: optionalField,
});

/**
 * Parse the model's JSON answer into a claim.
 * Tolerates markdown code fences and prose around the object.
 * @returns null when there is no JSON object or no provider name
 */
export function parseClaimResponse(text: string): ProviderClaim | null {
  const cleaned = text
    .trim()
    .replace(/^```(?:json)?/i, "")
    .replace(/```$/, "")
    .trim();

  const jsonMatch = cleaned.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(jsonMatch[0]);
  } catch {
    return null;
  }

  const parsed = ClaimResponseSchema.safeParse(json);
  if (!parsed.success || !parsed.data.provider_name) {
    return null;
  }

  const { provider_name, npi_number, address_raw, phone, website } = parsed.data;
  const claim: ProviderClaim = { name: provider_name };
  if (npi_number) claim.identifier = npi_number;
  if (address_raw) claim.address = address_raw;
  if (phone) claim.phone = phone;
  if (website) claim.website = website;
  return claim;
}

/**
 * Gemini client that reads provider details off scanned documents
 * (letterheads, business cards, PDFs, Word files, plain text)
 */
export class GeminiClaimExtractor {
  private readonly genAI: GoogleGenerativeAI;
  private readonly modelName: string;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  private static readonly PROMPT = `Analyze this document (image, PDF, or text) regarding a healthcare provider.
Extract the following fields strictly as JSON:
"provider_name", "npi_number" (if visible, else null), "address_raw" (full address string), "phone", "website".
Do not wrap the output in markdown. Return raw JSON only.`;

  constructor(config: GeminiConfig) {
    this.genAI = new GoogleGenerativeAI(config.apiKey);
    this.modelName = config.model ?? "gemini-2.0-flash";
    this.maxAttempts = config.maxAttempts ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 2000;
  }

  /**
   * Build the document part for a file
   */
  private async prepareDocument(filePath: string): Promise<Part> {
    const extension = extname(filePath).toLowerCase();

    if (TEXT_EXTENSIONS.has(extension)) {
      return { text: await readFile(filePath, "utf8") };
    }

    if (extension === WORD_EXTENSION) {
      const { value } = await mammoth.extractRawText({ path: filePath });
      return { text: value };
    }

    const mimeType = INLINE_MIME_TYPES[extension];
    if (!mimeType) {
      throw new CollaboratorError("Gemini", `Unsupported document type: ${extension || "none"}`);
    }

    const bytes = await readFile(filePath);
    return { inlineData: { mimeType, data: bytes.toString("base64") } };
  }

  /**
   * Extract a provider claim from a document on disk.
   * @returns null when no attempt produced a usable claim
   */
  async extractClaim(filePath: string): Promise<ProviderClaim | null> {
    const document = await this.prepareDocument(filePath);
    const model = this.genAI.getGenerativeModel({ model: this.modelName });

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const result = await model.generateContent([GeminiClaimExtractor.PROMPT, document]);
        const claim = parseClaimResponse(result.response.text());
        if (claim) {
          return claim;
        }
        console.warn(`[Gemini] Attempt ${attempt}/${this.maxAttempts}: no usable claim in response`);
      } catch (error) {
        console.warn(`[Gemini] Attempt ${attempt}/${this.maxAttempts}: API call failed - ${describeError(error)}`);
      }

      if (attempt < this.maxAttempts) {
        await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
      }
    }

    return null;
  }
}

/**
 * Create a GeminiClaimExtractor from environment variables
 */
export function createGeminiClaimExtractor(): GeminiClaimExtractor {
  const apiKey = process.env.GEMINI_API_KEY;

  if (!apiKey) {
    throw new Error("GEMINI_API_KEY environment variable is required");
  }

  return new GeminiClaimExtractor({
    apiKey,
    model: process.env.GEMINI_MODEL ?? "gemini-2.0-flash",
  });
}
