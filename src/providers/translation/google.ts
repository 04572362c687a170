import type { TranslationProvider } from "../../domain/providers.js";
import type { LanguageCode } from "../../domain/types.js";
import { TranslationError } from "../../domain/errors.js";

type GoogleTranslateResponse = {
  data?: { translations?: Array<{ translatedText?: string }> };
  error?: { message?: string };
};

export type GoogleTranslateOptions = {
  readonly apiKey: string;
  readonly endpoint?: string;
};

export class GoogleTranslationProvider implements TranslationProvider {
  public readonly name = "google-translate-v2";

  public constructor(private readonly opts: GoogleTranslateOptions) {}

  public async translate(
    text: string,
    sourceLanguage: LanguageCode,
    targetLanguage: LanguageCode,
  ): Promise<string> {
    const endpoint =
      this.opts.endpoint ??
      `https://translation.googleapis.com/language/translate/v2?key=${encodeURIComponent(this.opts.apiKey)}`;

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          q: text,
          source: sourceLanguage,
          target: targetLanguage,
          format: "text",
        }),
      });
    } catch (error) {
      throw new TranslationError("google translate request failed", error);
    }

    let body: GoogleTranslateResponse;
    try {
      body = (await response.json()) as GoogleTranslateResponse;
    } catch (error) {
      throw new TranslationError(`google translate returned unreadable body (${response.status})`, error);
    }

    if (!response.ok) {
      throw new TranslationError(
        `google translate rejected request (${response.status}): ${body.error?.message ?? "unknown error"}`,
      );
    }

    const translated = body.data?.translations?.[0]?.translatedText;
    if (!translated) {
      throw new TranslationError("google translate returned no translation");
    }
    return translated;
  }
}
