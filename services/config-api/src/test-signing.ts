import nacl from 'tweetnacl';
import { decodeBase64, decodeUTF8 } from 'tweetnacl-util';
import type { SignedConfig } from '@tilewalker/shared';
import { AGENT_KEYS, buildConfigResponse } from './app';
import type { ConfigResponse } from './app';

function check(condition: boolean, message: string) {
    if (!condition) {
        console.error(`FAILED: ${message}`);
        process.exit(1);
    }
}

const keyPair = nacl.sign.keyPair.fromSeed(new Uint8Array(32).fill(3));
const now = 1000000;

function signedBody(response: ConfigResponse): SignedConfig {
    const body = response.body;
    if (!('signature' in body)) {
        console.error('FAILED: response should carry a signed config', body);
        process.exit(1);
    }
    return body;
}

function verifies(config: SignedConfig): boolean {
    const { signature, ...payload } = config;
    return nacl.sign.detached.verify(decodeUTF8(JSON.stringify(payload)), decodeBase64(signature), keyPair.publicKey);
}

console.log('Running config signing tests...');

// 1. Request validation
const missing = buildConfigResponse(AGENT_KEYS, undefined, 'local-agent', keyPair.secretKey, '1.0.0', now);
check(missing.status === 400, 'missing key should be a bad request');
const unknown = buildConfigResponse(AGENT_KEYS, 'ak_nope', 'local-agent', keyPair.secretKey, '1.0.0', now);
check(unknown.status === 200 && 'allowed' in unknown.body && unknown.body.allowed === false, 'unknown key should not be allowed');

// 2. Signed payload
const known = signedBody(buildConfigResponse(AGENT_KEYS, 'ak_test_123', 'local-agent', keyPair.secretKey, '1.0.0', now));
check(verifies(known), 'signature should verify against the public key');
check(known.allowed && !known.killSwitch, 'listed agent should be allowed');
check(known.notBefore === 940000, 'validity should start a minute early');
check(known.notAfter === 87400000, 'validity should last a day');
check(known.version === '1.0.0', 'version should be stamped');
check(!verifies({ ...known, allowed: false }), 'edited payload should not verify');

// 3. Agent allow-lists
const stranger = signedBody(buildConfigResponse(AGENT_KEYS, 'ak_test_123', 'stranger', keyPair.secretKey, '1.0.0', now));
check(!stranger.allowed, 'unlisted agent should not be allowed');
const wildcard = signedBody(buildConfigResponse(AGENT_KEYS, 'ak_observe_only', 'stranger', keyPair.secretKey, '1.0.0', now));
check(wildcard.allowed && wildcard.config.engine === 'off', 'wildcard key should allow any agent');

const cautious = signedBody(buildConfigResponse(AGENT_KEYS, 'ak_cautious', 'local-agent', keyPair.secretKey, '1.0.0', now));
check(cautious.config.tuning?.navigation?.maxChunkSteps === 10, 'tuning overrides should be shipped');

console.log('All config signing tests passed!');
