import dotenv from 'dotenv';
import { z } from 'zod';
import type { LogLevel } from '../utils/logger.js';

dotenv.config();

export type Liftover = boolean | 'primary';

export interface Config {
    database: {
        path: string;
    };
    variantValidator: {
        baseUrl: string;
        genomeBuild: string;
        transcriptModel: string;
        selectTranscripts: string;
        checkOnly: boolean;
        liftover: Liftover;
        minDelayMs: number;
    };
    clinvar: {
        baseUrl: string;
        apiKey?: string;
    };
    http: {
        timeoutMs: number;
    };
    logging: {
        level: LogLevel;
    };
}

const booleanFlag = z
    .enum(['true', 'false', 'True', 'False', '1', '0'])
    .transform(value => value === 'true' || value === 'True' || value === '1');

const EnvSchema = z.object({
    DATABASE_PATH: z.string().min(1).default('instance/variants.db'),
    VARIANT_VALIDATOR_BASE_URL: z.string().url().default('https://rest.variantvalidator.org/LOVD/lovd'),
    GENOME_BUILD: z.enum(['GRCh38', 'GRCh37', 'hg38', 'hg19']).default('GRCh38'),
    TRANSCRIPT_MODEL: z.enum(['all', 'refseq', 'ensembl']).default('all'),
    SELECT_TRANSCRIPTS: z.string().min(1).default('mane'),
    CHECK_ONLY: booleanFlag.default('true'),
    LIFTOVER: z
        .enum(['true', 'false', 'True', 'False', 'primary'])
        .transform((value): Liftover => (value === 'primary' ? 'primary' : value.toLowerCase() === 'true'))
        .default('true'),
    MIN_CALL_DELAY_MS: z.coerce.number().int().min(0).default(250),
    CLINVAR_BASE_URL: z.string().url().default('https://eutils.ncbi.nlm.nih.gov/entrez/eutils'),
    NCBI_API_KEY: z.string().min(1).optional(),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${problems}`);
    }

    const values = parsed.data;
    return {
        database: {
            path: values.DATABASE_PATH,
        },
        variantValidator: {
            baseUrl: values.VARIANT_VALIDATOR_BASE_URL.replace(/\/+$/, ''),
            genomeBuild: values.GENOME_BUILD,
            transcriptModel: values.TRANSCRIPT_MODEL,
            selectTranscripts: values.SELECT_TRANSCRIPTS,
            checkOnly: values.CHECK_ONLY,
            liftover: values.LIFTOVER,
            minDelayMs: values.MIN_CALL_DELAY_MS,
        },
        clinvar: {
            baseUrl: values.CLINVAR_BASE_URL.replace(/\/+$/, ''),
            apiKey: values.NCBI_API_KEY,
        },
        http: {
            timeoutMs: values.HTTP_TIMEOUT_MS,
        },
        logging: {
            level: values.LOG_LEVEL,
        },
    };
}

export const config: Config = loadConfig();
