/**
 * A paper provider the service can search.
 * OSF providers are fetched live; standalone ones are compiled in.
 */
export interface Provider {
    id: string;
    type: ProviderType;
    description: string;
    /** OSF taxonomy listing for the provider */
    taxonomies?: string;
    /** OSF preprint listing for the provider */
    preprints?: string;
}

export type ProviderType = 'osf' | 'standalone';
