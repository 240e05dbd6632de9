/**
 * Interface for machine-translation adapters (DeepL).
 */
export interface Translator {
    /** Provider name */
    readonly name: string;

    /**
     * Translate a batch of texts.
     * @returns One entry per input, in order; null where no translation came back
     */
    translate(texts: string[]): Promise<Array<string | null>>;
}
