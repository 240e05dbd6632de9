import type { PaperRecord, Translator } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Translate every non-empty abstract in one batch and store the results in
 * `abstract_translated`.
 *
 * Best-effort: a failed call leaves the records untouched, and a response
 * shorter or longer than the request only fills the entries it lines up with.
 */
export async function translateAbstracts(
    records: readonly PaperRecord[],
    translator: Translator
): Promise<readonly PaperRecord[]> {
    const logger = getLogger();

    const texts: string[] = [];
    const positions: number[] = [];
    records.forEach((record, index) => {
        if (record.abstract) {
            texts.push(record.abstract);
            positions.push(index);
        }
    });

    if (texts.length === 0) {
        logger.info('No abstracts to translate');
        return records;
    }

    logger.info({ count: texts.length, translator: translator.name }, 'Translating abstracts');

    let translations: Array<string | null>;
    try {
        translations = await translator.translate(texts);
    } catch (error) {
        logger.error({ error, translator: translator.name }, 'Translation failed, keeping original abstracts');
        return records;
    }

    if (translations.length !== texts.length) {
        logger.warn(
            { requested: texts.length, received: translations.length },
            'Translation count mismatch, applying the overlapping entries only'
        );
    }

    const updated = [...records];
    positions.forEach((recordIndex, i) => {
        const translated = translations[i];
        const record = updated[recordIndex];
        if (translated && record) {
            updated[recordIndex] = { ...record, abstract_translated: translated };
        }
    });

    return updated;
}
