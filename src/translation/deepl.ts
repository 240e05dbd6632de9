import type { Translator } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

interface DeepLResponse {
    translations?: Array<{ detected_source_language?: string; text?: string }>;
}

export interface DeepLOptions {
    authKey: string;
    apiUrl: string;
    targetLang: string;
}

/**
 * DeepL translation adapter.
 *
 * @see https://developers.deepl.com/docs/api-reference/translate
 */
export class DeepLTranslator implements Translator {
    readonly name = 'DeepL';
    private httpClient: HttpClient;

    constructor(private readonly options: DeepLOptions) {
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async translate(texts: string[]): Promise<Array<string | null>> {
        if (texts.length === 0) return [];

        const response = await this.httpClient.post<DeepLResponse>(
            this.options.apiUrl,
            { text: texts, target_lang: this.options.targetLang },
            {
                source: 'deepl',
                timeout: 30000,
                headers: { Authorization: `DeepL-Auth-Key ${this.options.authKey}` },
            }
        );

        const translations = response.data?.translations;
        if (!Array.isArray(translations)) {
            getLogger().error({ response: response.data }, 'Unexpected DeepL response structure');
            return [];
        }

        return translations.map((t) => t.text || null);
    }
}
