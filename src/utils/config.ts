import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type PharmaPapersConfig } from '../types/index.js';
import { parseLexiconInput } from '../classify/lexicon.js';
import { getLogger } from './logger.js';

const MODULE_NAME = 'pharma-papers';

/**
 * Load configuration from pharma-papers.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<PharmaPapersConfig> | null> {
    const explorer = cosmiconfig(MODULE_NAME, {
        searchPlaces: [`${MODULE_NAME}.config.json`],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            const config: Partial<PharmaPapersConfig> = result.config;
            if (config.lexicon !== undefined) {
                config.lexicon = parseLexiconInput(config.lexicon);
            }
            return config;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<PharmaPapersConfig> {
    const config: Partial<PharmaPapersConfig> = {};

    if (env['NCBI_API_KEY']) {
        config.apiKey = env['NCBI_API_KEY'];
    }
    if (env['NCBI_EMAIL']) {
        config.email = env['NCBI_EMAIL'];
    }

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * CLI flags must omit options the user did not pass, otherwise an
 * undefined value would shadow the config file.
 */
export async function resolveConfig(
    cliFlags: Partial<PharmaPapersConfig> & Pick<PharmaPapersConfig, 'query'>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<PharmaPapersConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        lexicon: {
            ...DEFAULT_CONFIG.lexicon,
            ...fileConfig?.lexicon,
            ...cliFlags.lexicon,
        },
    };
}
