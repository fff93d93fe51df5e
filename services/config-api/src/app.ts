import express from 'express';
import cors from 'cors';
import nacl from 'tweetnacl';
import { decodeUTF8, encodeBase64 } from 'tweetnacl-util';
import type { Config, FeatureFlags, SignedConfig } from '@tilewalker/shared';

const NOT_BEFORE_SKEW_MS = 60000;
const VALIDITY_MS = 3600000 * 24;

export interface AgentKeyRecord {
    agents: string[];
    config: Config;
    features: FeatureFlags;
    killSwitch?: boolean;
}

// Mock database
export const AGENT_KEYS: Record<string, AgentKeyRecord> = {
    ak_test_123: {
        agents: ['local-agent', 'ci-agent'],
        config: { key: 'ak_test_123', engine: 'on' },
        features: { enableTelemetry: true, enableRecovery: true }
    },
    ak_cautious: {
        agents: ['local-agent'],
        config: {
            key: 'ak_cautious',
            engine: 'on',
            tuning: {
                navigation: { maxChunkSteps: 10 },
                floorGuard: { intentDirectionTolerance: false }
            }
        },
        features: { enableTelemetry: true, enableRecovery: true }
    },
    ak_observe_only: {
        agents: ['*'],
        config: { key: 'ak_observe_only', engine: 'off' },
        features: { enableTelemetry: false, enableRecovery: false }
    }
};

export interface ConfigResponse {
    status: number;
    body: SignedConfig | { allowed: false; killSwitch: false; error: string } | { error: string };
}

export type UnsignedConfig = Omit<SignedConfig, 'signature'>;

export function signConfig(payload: UnsignedConfig, secretKey: Uint8Array): SignedConfig {
    const message = JSON.stringify(payload);
    const signature = nacl.sign.detached(decodeUTF8(message), secretKey);
    return {
        ...payload,
        signature: encodeBase64(signature)
    };
}

export function buildConfigResponse(
    registry: Record<string, AgentKeyRecord>,
    key: unknown,
    agent: unknown,
    secretKey: Uint8Array,
    version: string,
    now: number
): ConfigResponse {
    if (typeof key !== 'string' || typeof agent !== 'string') {
        return { status: 400, body: { error: 'Missing key or agent parameter' } };
    }

    const record = registry[key];
    if (!record) {
        return { status: 200, body: { allowed: false, killSwitch: false, error: 'Invalid key' } };
    }

    const payload: UnsignedConfig = {
        config: record.config,
        features: record.features,
        allowed: record.agents.includes(agent) || record.agents.includes('*'),
        killSwitch: record.killSwitch ?? false,
        notBefore: now - NOT_BEFORE_SKEW_MS,
        notAfter: now + VALIDITY_MS,
        version
    };
    return { status: 200, body: signConfig(payload, secretKey) };
}

export interface ConfigAppOptions {
    keyPair: nacl.SignKeyPair;
    version: string;
    registry?: Record<string, AgentKeyRecord>;
}

export function createConfigApp(options: ConfigAppOptions) {
    const app = express();
    const registry = options.registry ?? AGENT_KEYS;

    app.use(cors());

    app.get('/config', (req, res) => {
        const { key, agent } = req.query;
        const response = buildConfigResponse(registry, key, agent, options.keyPair.secretKey, options.version, Date.now());
        res.status(response.status).json(response.body);
    });

    app.get('/public-key', (_req, res) => {
        res.json({ publicKey: encodeBase64(options.keyPair.publicKey) });
    });

    return app;
}
