import type { SignedConfig } from '@tilewalker/shared';
import { combineOverrides, isTuningOverrides, mergeTuning } from '@tilewalker/runtime';
import nacl from 'tweetnacl';
import { decodeUTF8, encodeBase64 } from 'tweetnacl-util';
import { checkSignedConfig, isSignedConfig, localFallback, parseLocalSettings, verifyConfigSignature } from './index';

function check(condition: boolean, message: string) {
    if (!condition) {
        console.error(`FAILED: ${message}`);
        process.exit(1);
    }
}

const keyPair = nacl.sign.keyPair.fromSeed(new Uint8Array(32).fill(7));
const publicKey = encodeBase64(keyPair.publicKey);
const now = 1000000;

function sign(payload: Omit<SignedConfig, 'signature'>): SignedConfig {
    const signature = nacl.sign.detached(decodeUTF8(JSON.stringify(payload)), keyPair.secretKey);
    return { ...payload, signature: encodeBase64(signature) };
}

const unsigned: Omit<SignedConfig, 'signature'> = {
    config: { key: 'test-key', engine: 'on' },
    features: { enableTelemetry: true, enableRecovery: true },
    allowed: true,
    killSwitch: false,
    notBefore: 900000,
    notAfter: 2000000,
    version: '1.0.0'
};
const signed = sign(unsigned);

console.log('Running config loader tests...');

// 1. Signatures
check(verifyConfigSignature(signed, publicKey), 'genuine config should verify');
const tampered: SignedConfig = { ...signed, config: { ...signed.config, engine: 'off' } };
check(!verifyConfigSignature(tampered, publicKey), 'edited config should fail verification');
const received: unknown = JSON.parse(JSON.stringify(signed));
check(isSignedConfig(received) && verifyConfigSignature(received, publicKey), 'config should survive the wire');

// 2. Verdicts
const verdictOf = (config: SignedConfig, key: string | null, time: number) => {
    const verdict = checkSignedConfig(config, key, time);
    return verdict.ok ? 'ok' : verdict.reason;
};
check(verdictOf(signed, publicKey, now) === 'ok', 'valid config should be accepted');
check(verdictOf(tampered, publicKey, now) === 'bad-signature', 'tampered config should be rejected');
check(verdictOf(signed, null, now) === 'bad-signature', 'remote config without a public key should be rejected');
check(verdictOf(signed, publicKey, 899999) === 'not-yet-valid', 'config before its window should be rejected');
check(verdictOf(signed, publicKey, 2000001) === 'expired', 'config after its window should be rejected');
check(verdictOf(sign({ ...unsigned, allowed: false }), publicKey, now) === 'not-allowed', 'disallowed agent should be rejected');
check(verdictOf(sign({ ...unsigned, killSwitch: true }), publicKey, now) === 'kill-switch', 'kill switch should be honored');

const fallback = localFallback(parseLocalSettings({ TILEWALKER_KEY: 'test-key' }), now);
check(fallback.config.key === 'test-key' && fallback.version === 'local', 'fallback should carry the local key');
check(verdictOf(fallback, null, now) === 'ok', 'local fallback should not need a signature');

// 3. Shape checks
check(!isSignedConfig(null), 'null is not a config');
check(!isSignedConfig({ ...signed, notAfter: 'soon' }), 'non-numeric window should be rejected');
check(!isSignedConfig({ ...signed, config: { key: 'test-key', engine: 'maybe' } }), 'unknown engine mode should be rejected');

// 4. Environment settings
const settings = parseLocalSettings({
    TILEWALKER_KEY: 'test-key',
    TILEWALKER_ENGINE: 'off',
    TILEWALKER_TUNING: '{"navigation":{"maxChunkSteps":12}}'
});
check(settings.key === 'test-key' && settings.engine === 'off', 'key and engine should be read');
check(settings.agent === 'local-agent' && settings.apiBase === 'http://localhost:4001', 'defaults should fill the rest');
check(settings.publicKey === null, 'missing public key should be null');
check(settings.tuning?.navigation?.maxChunkSteps === 12, 'tuning overrides should be parsed');

const sloppy = parseLocalSettings({ TILEWALKER_ENGINE: 'sideways', TILEWALKER_TUNING: '{"navigation":{"maxChunkSteps":"big"}}' });
check(sloppy.engine === undefined, 'unknown engine mode should be ignored');
check(sloppy.tuning === undefined, 'mistyped tuning should be ignored');

// 5. Tuning overrides
check(isTuningOverrides({ planner: { nodeBudget: 100 } }), 'known numeric field should be accepted');
check(!isTuningOverrides({ planner: { nodeBudget: '100' } }), 'string for a number should be rejected');
check(!isTuningOverrides({ wings: {} }), 'unknown section should be rejected');
check(!isTuningOverrides({ planner: { flying: true } }), 'unknown field should be rejected');

const combined = combineOverrides({ navigation: { maxChunkSteps: 10, validateSteps: 20 } }, { navigation: { maxChunkSteps: 12 } });
check(combined.navigation?.maxChunkSteps === 12 && combined.navigation.validateSteps === 20, 'later overrides should win field by field');
const tuning = mergeTuning(combined);
check(tuning.navigation.maxChunkSteps === 12 && tuning.navigation.maxPathDistance === 50, 'overrides should merge over defaults');
check(tuning.planner.nodeBudget === 500, 'untouched sections should keep defaults');

console.log('All config loader tests passed!');
