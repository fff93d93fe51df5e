import nacl from 'tweetnacl';
import { encodeBase64 } from 'tweetnacl-util';
import { createConfigApp } from './app';

const port = process.env.PORT || 4001;
const version = process.env.RUNTIME_VERSION || '1.0.0';

// Signing key: a 32-byte hex seed from the environment, or a throwaway pair for development
function loadKeyPair(): nacl.SignKeyPair {
    const seedHex = process.env.CONFIG_SIGNING_SEED;
    if (seedHex && /^[0-9a-f]{64}$/i.test(seedHex)) {
        return nacl.sign.keyPair.fromSeed(Uint8Array.from(Buffer.from(seedHex, 'hex')));
    }
    if (seedHex) console.warn('CONFIG_SIGNING_SEED must be 64 hex characters; generating a development key.');
    return nacl.sign.keyPair();
}

const keyPair = loadKeyPair();
console.log('Public Key for Verification (Base64):', encodeBase64(keyPair.publicKey));

const app = createConfigApp({ keyPair, version });

app.listen(port, () => {
    console.log(`Config API listening at http://localhost:${port}`);
});
