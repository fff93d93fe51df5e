import type { AgentHost, Config, SignedConfig, TuningOverrides } from '@tilewalker/shared';
import { HttpTelemetrySink, combineOverrides, init, isTuningOverrides } from '@tilewalker/runtime';
import type { Runtime } from '@tilewalker/runtime';
import nacl from 'tweetnacl';
import { decodeBase64, decodeUTF8 } from 'tweetnacl-util';

const DEFAULT_API_BASE_URL = 'http://localhost:4001';
const DEFAULT_TELEMETRY_URL = 'http://localhost:4002/event';
const DEFAULT_AGENT = 'local-agent';
const LOCAL_VALIDITY_MS = 1000 * 60 * 60 * 24 * 365;

export interface LocalSettings {
    key?: string;
    engine?: Config['engine'];
    agent: string;
    apiBase: string;
    telemetryUrl: string;
    publicKey: string | null;
    tuning?: TuningOverrides;
}

export type ConfigRejection = 'bad-signature' | 'not-yet-valid' | 'expired' | 'not-allowed' | 'kill-switch';

export type ConfigVerdict = { ok: true } | { ok: false; reason: ConfigRejection };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads loader settings from the environment (TILEWALKER_* variables).
 */
export function parseLocalSettings(env: NodeJS.ProcessEnv): LocalSettings {
    const settings: LocalSettings = {
        agent: env.TILEWALKER_AGENT || DEFAULT_AGENT,
        apiBase: env.TILEWALKER_API || DEFAULT_API_BASE_URL,
        telemetryUrl: env.TILEWALKER_TELEMETRY || DEFAULT_TELEMETRY_URL,
        publicKey: env.TILEWALKER_PUBLIC_KEY || null
    };

    if (env.TILEWALKER_KEY) settings.key = env.TILEWALKER_KEY;

    const engine = env.TILEWALKER_ENGINE;
    if (engine === 'on' || engine === 'off') settings.engine = engine;

    if (env.TILEWALKER_TUNING) {
        try {
            const parsed: unknown = JSON.parse(env.TILEWALKER_TUNING);
            if (isTuningOverrides(parsed)) settings.tuning = parsed;
            else console.warn('Tilewalker: Ignoring TILEWALKER_TUNING with unknown fields.');
        } catch (e) {
            console.warn('Tilewalker: TILEWALKER_TUNING is not valid JSON.', e);
        }
    }

    return settings;
}

export function isSignedConfig(value: unknown): value is SignedConfig {
    if (!isRecord(value)) return false;
    const { config, features } = value;
    return isRecord(config)
        && typeof config.key === 'string'
        && (config.engine === 'on' || config.engine === 'off')
        && (config.tuning === undefined || isTuningOverrides(config.tuning))
        && isRecord(features)
        && typeof features.enableTelemetry === 'boolean'
        && typeof features.enableRecovery === 'boolean'
        && typeof value.allowed === 'boolean'
        && typeof value.killSwitch === 'boolean'
        && typeof value.notBefore === 'number'
        && typeof value.notAfter === 'number'
        && typeof value.signature === 'string'
        && typeof value.version === 'string';
}

/**
 * Fetches the signed configuration from the config API.
 */
export async function fetchConfig(apiBase: string, key: string, agent: string): Promise<SignedConfig | null> {
    try {
        const response = await fetch(`${apiBase}/config?key=${encodeURIComponent(key)}&agent=${encodeURIComponent(agent)}`);
        if (!response.ok) {
            throw new Error(`Config fetch failed: ${response.status}`);
        }
        const body: unknown = await response.json();
        if (!isSignedConfig(body)) {
            console.error('Tilewalker: Config response has an unexpected shape', body);
            return null;
        }
        return body;
    } catch (e) {
        console.error('Tilewalker: Failed to fetch config', e);
        return null;
    }
}

export function verifyConfigSignature(signedConfig: SignedConfig, publicKey: string): boolean {
    try {
        const { signature, ...payload } = signedConfig;
        if (!signature) return false;

        const message = JSON.stringify(payload);
        return nacl.sign.detached.verify(
            decodeUTF8(message),
            decodeBase64(signature),
            decodeBase64(publicKey)
        );
    } catch (e) {
        console.error('Tilewalker: Signature verification error', e);
        return false;
    }
}

export function checkSignedConfig(signedConfig: SignedConfig, publicKey: string | null, now: number): ConfigVerdict {
    if (signedConfig.version !== 'local') {
        if (!publicKey || !verifyConfigSignature(signedConfig, publicKey)) return { ok: false, reason: 'bad-signature' };
    }
    if (now < signedConfig.notBefore) return { ok: false, reason: 'not-yet-valid' };
    if (now > signedConfig.notAfter) return { ok: false, reason: 'expired' };
    if (!signedConfig.allowed) return { ok: false, reason: 'not-allowed' };
    if (signedConfig.killSwitch) return { ok: false, reason: 'kill-switch' };
    return { ok: true };
}

export function localFallback(local: LocalSettings, now: number): SignedConfig {
    return {
        config: { key: local.key ?? '', engine: local.engine ?? 'on' },
        features: { enableTelemetry: false, enableRecovery: true },
        allowed: true,
        killSwitch: false,
        notBefore: 0,
        notAfter: now + LOCAL_VALIDITY_MS,
        signature: 'unsigned',
        version: 'local'
    };
}

/**
 * Boot sequence: local settings, remote config, verification, then the runtime.
 */
export async function boot(host: AgentHost, env: NodeJS.ProcessEnv = process.env): Promise<Runtime | null> {
    const local = parseLocalSettings(env);
    if (!local.key) {
        console.error('Tilewalker: Missing TILEWALKER_KEY. Aborting.');
        return null;
    }

    console.log('Tilewalker: Booting...', { agent: local.agent, apiBase: local.apiBase });

    let remoteConfig = await fetchConfig(local.apiBase, local.key, local.agent);
    if (!remoteConfig) {
        console.warn('Tilewalker: Failed to retrieve remote configuration. Using local development fallback.');
        remoteConfig = localFallback(local, Date.now());
    }

    const verdict = checkSignedConfig(remoteConfig, local.publicKey, Date.now());
    if (!verdict.ok) {
        console.error(`Tilewalker: Config rejected (${verdict.reason}).`);
        return null;
    }

    if (local.engine === 'off' || remoteConfig.config.engine === 'off') {
        console.log('Tilewalker: Engine disabled by configuration.');
        return null;
    }

    const features = remoteConfig.features;
    const runtime = init(host, {
        tuning: combineOverrides(remoteConfig.config.tuning, local.tuning),
        features,
        telemetry: features.enableTelemetry ? new HttpTelemetrySink(local.telemetryUrl) : undefined
    });
    console.log(`Tilewalker: Runtime ${remoteConfig.version} running.`);
    return runtime;
}
