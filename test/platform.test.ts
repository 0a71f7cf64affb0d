import { assert, describe, test } from 'vitest';
import { ValidationError } from '../lib/errors.js';
import { formatPlatform, matchesPlatform, parsePlatform } from '../lib/platform.js';

describe('platform', () => {
    test('parsePlatform should split os, architecture and variant', () => {
        assert.deepEqual(parsePlatform('linux/amd64'), { os: 'linux', architecture: 'amd64' });
        assert.deepEqual(parsePlatform('linux/arm64/v8'), {
            os: 'linux',
            architecture: 'arm64',
            variant: 'v8',
        });
    });

    test.each(['linux', 'linux/', 'linux/arm/v7/extra', 'linux/amd 64'])(
        'parsePlatform should reject %s',
        (value) => {
            assert.throws(() => parsePlatform(value), ValidationError);
        },
    );

    test('matchesPlatform should ignore the variant when none is requested', () => {
        const platform = { os: 'linux', architecture: 'arm', variant: 'v7' };
        assert.isTrue(matchesPlatform(platform, parsePlatform('linux/arm')));
        assert.isTrue(matchesPlatform(platform, parsePlatform('linux/arm/v7')));
        assert.isFalse(matchesPlatform(platform, parsePlatform('linux/arm/v6')));
        assert.isFalse(matchesPlatform(platform, parsePlatform('windows/arm')));
    });

    test('formatPlatform should include the variant only when set', () => {
        assert.equal(formatPlatform({ os: 'linux', architecture: 'amd64' }), 'linux/amd64');
        assert.equal(
            formatPlatform({ os: 'linux', architecture: 'arm64', variant: 'v8' }),
            'linux/arm64/v8',
        );
    });
});
