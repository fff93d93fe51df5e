import { scrub } from './utils';

const testPayloads = [
    {
        name: 'Sensitive fields',
        payload: {
            agent: {
                agentKey: 'test-key',
                auth: 'test-token',
                profile: {
                    secret: 'test-secret',
                    name: 'scout'
                }
            },
            signature: 'c2lnbmF0dXJl',
            position: { x: 1, y: 2, z: 7 }
        },
        expected: {
            agent: {
                agentKey: '[REDACTED]',
                auth: '[REDACTED]',
                profile: {
                    secret: '[REDACTED]',
                    name: 'scout'
                }
            },
            signature: '[REDACTED]',
            position: { x: 1, y: 2, z: 7 }
        }
    },
    {
        name: 'URLs with sensitive data',
        payload: {
            url: 'http://localhost:4001/config?key=test-key&agent=local-agent',
            endpoint: 'http://localhost:4002/event#token=12345',
            other_url: 'https://example.com/home?x=1'
        },
        expected: {
            url: 'http://localhost:4001/config',
            endpoint: 'http://localhost:4002/event',
            other_url: 'https://example.com/home?x=1'
        }
    },
    {
        name: 'Arrays and nested structures',
        payload: {
            events: [
                { type: 'boot', token: 'test-token' },
                { type: 'fetch', url: 'https://example.com?q=search' }
            ]
        },
        expected: {
            events: [
                { type: 'boot', token: '[REDACTED]' },
                { type: 'fetch', url: 'https://example.com/' }
            ]
        }
    },
    {
        name: 'Invalid/relative URLs',
        payload: {
            url: '/config?key=test-key',
            endpoint: 'just-a-path'
        },
        expected: {
            url: '[SENSITIVE URL REDACTED]',
            endpoint: 'just-a-path'
        }
    }
];

function runTests() {
    let passed = 0;
    let failed = 0;

    console.log('--- Running Telemetry Scrubbing Tests ---');

    for (const test of testPayloads) {
        const result = scrub(test.payload);
        const resultStr = JSON.stringify(result);
        const expectedStr = JSON.stringify(test.expected);

        if (resultStr === expectedStr) {
            console.log(`✅ PASSED: ${test.name}`);
            passed++;
        } else {
            console.log(`❌ FAILED: ${test.name}`);
            console.log('  Expected:', expectedStr);
            console.log('  Actual:  ', resultStr);
            failed++;
        }
    }

    console.log(`\nTests finished: ${passed} passed, ${failed} failed.`);
    if (failed > 0) {
        process.exit(1);
    }
}

runTests();
