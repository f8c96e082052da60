import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import * as yaml from 'js-yaml';
import * as dotenv from 'dotenv';
import { ConfigError, toErrorMessage } from '../errors';
import { getLogger } from '../logger';

// Load environment variables immediately
dotenv.config();

type ConfigRecord = Record<string, unknown>;

export interface ConfigOptions<T extends z.ZodTypeAny> {
    schema: T;
    appName: string;
    profile?: string;
    configPaths?: string[];
    env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is ConfigRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader<T extends z.ZodTypeAny> {
    private schema: T;
    private appName: string;
    private profile: string;
    private configPaths: string[];
    private env: NodeJS.ProcessEnv;

    constructor(options: ConfigOptions<T>) {
        this.schema = options.schema;
        this.appName = options.appName;
        this.env = options.env || process.env;
        this.profile = options.profile || this.env.NODE_ENV || 'default';
        this.configPaths = options.configPaths || [
            process.cwd(),
            path.join(os.homedir(), '.config', this.appName),
            path.join('/etc', this.appName)
        ];
    }

    public load(): z.infer<T> {
        let loadedConfig: ConfigRecord = {};

        // Order: default -> profile specific
        const filesToTry = [
            'config',
            `config.${this.profile}`
        ];

        const extensions = ['.yaml', '.yml', '.json'];

        for (const dir of this.configPaths) {
            for (const fileBase of filesToTry) {
                for (const ext of extensions) {
                    const filePath = path.join(dir, fileBase + ext);
                    if (!fs.existsSync(filePath)) continue;
                    try {
                        const content = fs.readFileSync(filePath, 'utf-8');
                        const parsed: unknown = ext === '.json' ? JSON.parse(content) : yaml.load(content);
                        if (isRecord(parsed)) {
                            loadedConfig = this.mergeDeep(loadedConfig, parsed);
                        }
                    } catch (e) {
                        getLogger().warn(`Failed to load config file ${filePath}`, { error: toErrorMessage(e) });
                    }
                }
            }
        }

        const envConfig = this.mapEnvToConfig(this.envPrefix());
        loadedConfig = this.mergeDeep(loadedConfig, envConfig);

        const result = this.schema.safeParse(loadedConfig);
        if (!result.success) {
            const issues = result.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`Invalid ${this.appName} configuration: ${issues}`);
        }
        return result.data;
    }

    private envPrefix(): string {
        return this.appName.toUpperCase().replace(/-/g, '_');
    }

    private mergeDeep(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
        Object.keys(source).forEach(key => {
            const targetValue = target[key];
            const sourceValue = source[key];

            if (Array.isArray(targetValue) && Array.isArray(sourceValue)) {
                target[key] = targetValue.concat(sourceValue);
            } else if (isRecord(targetValue) && isRecord(sourceValue)) {
                target[key] = this.mergeDeep(Object.assign({}, targetValue), sourceValue);
            } else {
                target[key] = sourceValue;
            }
        });

        return target;
    }

    // PREFIX_SECTION__SOME_KEY=1 -> { section: { someKey: 1 } }
    private mapEnvToConfig(prefix: string): ConfigRecord {
        const config: ConfigRecord = {};
        for (const key of Object.keys(this.env)) {
            if (!key.startsWith(prefix + '_')) continue;
            const raw = this.env[key];
            if (raw === undefined) continue;

            const parts = key
                .slice(prefix.length + 1)
                .split('__')
                .map(p => this.toCamelCase(p.toLowerCase()));

            let current = config;
            for (let i = 0; i < parts.length - 1; i++) {
                const next = current[parts[i]];
                if (isRecord(next)) {
                    current = next;
                } else {
                    const created: ConfigRecord = {};
                    current[parts[i]] = created;
                    current = created;
                }
            }

            let value: unknown = raw;
            if (raw === 'true') value = true;
            else if (raw === 'false') value = false;
            else if (raw !== '' && !isNaN(Number(raw))) value = Number(raw);

            current[parts[parts.length - 1]] = value;
        }
        return config;
    }

    private toCamelCase(str: string): string {
        return str.replace(/_([a-z])/g, (g) => g[1].toUpperCase());
    }
}
