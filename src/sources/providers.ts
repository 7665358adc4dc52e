import { DEFAULT_CONFIG, type Provider, type SourceAdapterOptions } from '../types/index.js';
import { getHttpClient, ResponseParseError, type HttpClient, type HttpResponse } from '../utils/http-client.js';
import { UpstreamParseError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * OSF JSON:API preprint-provider listing (subset of relevant fields).
 */
interface OsfProviderEntry {
    id: string;
    attributes?: { description?: string | null };
    relationships?: {
        taxonomies?: { links?: { related?: { href?: string } } };
        preprints?: { links?: { related?: { href?: string } } };
    };
}

interface OsfProviderListResponse {
    data: OsfProviderEntry[];
    links?: { next?: string | null };
}

/**
 * Providers served by their own adapters rather than through OSF.
 */
const STANDALONE_PROVIDERS: readonly Provider[] = [
    {
        id: 'arxiv',
        type: 'standalone',
        description:
            'arXiv is a free distribution service and an open-access archive for scholarly articles in physics, mathematics, computer science, quantitative biology, quantitative finance, statistics, electrical engineering and systems science, and economics.',
    },
    {
        id: 'openalex',
        type: 'standalone',
        description: 'OpenAlex is a comprehensive index of scholarly works across all disciplines.',
    },
];

/**
 * Knows the fixed standalone providers and fetches the OSF ones.
 * Nothing is cached: every query hits the OSF API.
 */
export class ProviderRegistry {
    private readonly httpClient: HttpClient;
    private readonly config: NonNullable<SourceAdapterOptions['config']>;

    constructor(options?: SourceAdapterOptions) {
        this.httpClient = options?.httpClient ?? getHttpClient();
        this.config = options?.config ?? DEFAULT_CONFIG;
    }

    /**
     * Fetch every OSF preprint provider, following pagination.
     * Sorted by id (case-sensitive).
     */
    async fetchOsfProviders(): Promise<Provider[]> {
        const providers: Provider[] = [];
        let url: string | null = `${this.config.endpoints.osfApi}/preprint_providers/`;

        while (url) {
            logger.debug({ url }, 'OSF provider listing');
            let response: HttpResponse<OsfProviderListResponse>;
            try {
                response = await this.httpClient.getJson<OsfProviderListResponse>(url, {
                    source: 'osf',
                    timeout: this.config.timeouts.request,
                });
            } catch (error) {
                if (error instanceof ResponseParseError) {
                    throw new UpstreamParseError(`Failed to parse OSF provider listing: ${error.message}`, error);
                }
                throw error;
            }

            providers.push(...(response.data.data ?? []).map(toProvider));
            url = response.data.links?.next ?? null;
        }

        return providers.sort((a, b) => compareStrings(a.id, b.id));
    }

    /**
     * Fixed list of non-OSF providers.
     */
    getExternalProviders(): Provider[] {
        return STANDALONE_PROVIDERS.map((provider) => ({ ...provider }));
    }

    /**
     * OSF and standalone providers, sorted by id case-insensitively.
     */
    async getAllProviders(): Promise<Provider[]> {
        const osfProviders = await this.fetchOsfProviders();
        return [...osfProviders, ...this.getExternalProviders()]
            .sort((a, b) => compareStrings(a.id.toLowerCase(), b.id.toLowerCase()));
    }

    /**
     * Whether `providerId` names a known provider. Unknown ids give false;
     * callers build the user-facing error.
     */
    async validateProvider(providerId: string): Promise<boolean> {
        const providers = await this.getAllProviders();
        return providers.some((provider) => provider.id === providerId);
    }
}

function toProvider(entry: OsfProviderEntry): Provider {
    const provider: Provider = {
        id: entry.id,
        type: 'osf',
        description: entry.attributes?.description ?? '',
    };

    const taxonomies = entry.relationships?.taxonomies?.links?.related?.href;
    if (taxonomies) provider.taxonomies = taxonomies;

    const preprints = entry.relationships?.preprints?.links?.related?.href;
    if (preprints) provider.preprints = preprints;

    return provider;
}

/** Code-unit ordering */
function compareStrings(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
