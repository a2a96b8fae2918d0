import { WORKING_LANGUAGE } from "./config.js";
import { UpstreamServiceError } from "./errors.js";
import type { LanguageDetector, Translator } from "./types.js";

export interface NormalizedText {
    text: string;
    languageCode: string;
}

export async function normalizeLanguage(
    text: string,
    detector: LanguageDetector,
    translator: Translator
): Promise<NormalizedText> {
    const [top] = await detector.detectLanguages(text);
    if (!top) {
        throw new UpstreamServiceError("Language detection returned no languages", "language-detection");
    }

    const languageCode = top.languageCode;
    console.log(`[LANGUAGE] Detected language: ${languageCode}`);
    if (languageCode === WORKING_LANGUAGE) {
        return { text, languageCode };
    }

    console.log(`[LANGUAGE] Translating ticket from ${languageCode} to ${WORKING_LANGUAGE}`);
    const translated = await translator.translate(text, languageCode, WORKING_LANGUAGE);
    if (translated === undefined) {
        throw new UpstreamServiceError(`Translation from ${languageCode} returned no text`, "translation");
    }
    console.log("[LANGUAGE] Translation complete");
    return { text: translated, languageCode };
}
