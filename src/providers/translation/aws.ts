import {
  TranslateClient,
  TranslateTextCommand,
  type TranslateTextCommandOutput,
} from "@aws-sdk/client-translate";
import type { TranslationProvider } from "../../domain/providers.js";
import type { LanguageCode } from "../../domain/types.js";
import { TranslationError } from "../../domain/errors.js";

export type TranslateSender = {
  send(command: TranslateTextCommand): Promise<TranslateTextCommandOutput>;
};

export class StubTranslationProvider implements TranslationProvider {
  public readonly name = "translate-stub";

  public async translate(
    text: string,
    _sourceLanguage: LanguageCode,
    targetLanguage: LanguageCode,
  ): Promise<string> {
    return `[${targetLanguage}] ${text}`;
  }
}

export class AwsTranslationProvider implements TranslationProvider {
  public readonly name = "aws-translate";

  public constructor(private readonly client: TranslateSender) {}

  public static forRegion(region: string): AwsTranslationProvider {
    return new AwsTranslationProvider(new TranslateClient({ region }));
  }

  public async translate(
    text: string,
    sourceLanguage: LanguageCode,
    targetLanguage: LanguageCode,
  ): Promise<string> {
    let out: TranslateTextCommandOutput;
    try {
      out = await this.client.send(
        new TranslateTextCommand({
          Text: text,
          SourceLanguageCode: sourceLanguage,
          TargetLanguageCode: targetLanguage,
        }),
      );
    } catch (error) {
      throw new TranslationError(`aws translate ${sourceLanguage}->${targetLanguage} failed`, error);
    }

    if (out.TranslatedText === undefined) {
      throw new TranslationError("aws translate returned no translation");
    }
    return out.TranslatedText;
  }
}
