import { assert, describe, test } from 'vitest';
import { Digest } from '../lib/digest.js';
import { ValidationError } from '../lib/errors.js';
import { Reference, isDockerHub, sameRegistry } from '../lib/reference.js';

const DIGEST = 'sha256:7173b809ca12ec5dee4506cd86be934c4596dd234ee82c0662eac04a8c2c71dc';

describe('Reference.parse', () => {
    test('should default the registry to docker.io', () => {
        const ref = Reference.parse('alpine');
        assert.equal(ref.registry, 'docker.io');
        assert.equal(ref.repository, 'alpine');
        assert.isUndefined(ref.tag);
        assert.isUndefined(ref.digest);
        assert.equal(ref.identifier, 'latest');
        assert.equal(ref.toString(), 'docker.io/alpine');
    });

    test('should use the given default registry', () => {
        const ref = Reference.parse('team/app', { defaultRegistry: 'registry.test' });
        assert.equal(ref.registry, 'registry.test');
        assert.equal(ref.repository, 'team/app');
    });

    test('should treat a first segment without dot, colon or localhost as a path', () => {
        const ref = Reference.parse('team/app');
        assert.equal(ref.registry, 'docker.io');
        assert.equal(ref.repository, 'team/app');
    });

    test('should read a first segment with uppercase letters as a registry host', () => {
        const ref = Reference.parse('Mirror/app:1.0');
        assert.equal(ref.registry, 'Mirror');
        assert.equal(ref.repository, 'app');
        assert.equal(ref.tag, '1.0');
    });

    test('should split registry, repository and tag', () => {
        const ref = Reference.parse('ghcr.io/org/app:1.2');
        assert.equal(ref.registry, 'ghcr.io');
        assert.equal(ref.repository, 'org/app');
        assert.equal(ref.tag, '1.2');
        assert.equal(ref.identifier, '1.2');
    });

    test('should not mistake a registry port for a tag', () => {
        const ref = Reference.parse(`localhost:5000/app@${DIGEST}`);
        assert.equal(ref.registry, 'localhost:5000');
        assert.equal(ref.repository, 'app');
        assert.isUndefined(ref.tag);
        assert.equal(ref.digest?.toString(), DIGEST);
        assert.equal(ref.identifier, DIGEST);
    });

    test('should keep both tag and digest and prefer the digest as identifier', () => {
        const input = `registry.test/team/app:v1@${DIGEST}`;
        const ref = Reference.parse(input);
        assert.equal(ref.tag, 'v1');
        assert.equal(ref.digest?.toString(), DIGEST);
        assert.equal(ref.identifier, DIGEST);
        assert.equal(ref.toString(), input);
    });

    test('should keep an explicit library namespace as written', () => {
        const ref = Reference.parse('docker.io/library/alpine:3.19');
        assert.equal(ref.registry, 'docker.io');
        assert.equal(ref.repository, 'library/alpine');
        assert.equal(ref.tag, '3.19');
    });

    test('should accept a tag of 128 characters', () => {
        const tag = 'x'.repeat(128);
        assert.equal(Reference.parse(`app:${tag}`).tag, tag);
    });

    test.each([
        ['an empty string', ''],
        ['an empty path segment', 'team//app'],
        ['a trailing slash', 'team/app/'],
        ['a registry without repository', 'registry.test/'],
        ['uppercase repository characters', 'team/App'],
        ['an empty tag', 'app:'],
        ['a tag starting with a dash', 'app:-bad'],
        ['a tag of 129 characters', `app:${'x'.repeat(129)}`],
        ['a malformed digest', 'app@sha256:invalid-digest'],
        ['an over-long repository', 'a'.repeat(256)],
    ])('should reject %s', (_name, input) => {
        assert.throws(() => Reference.parse(input), ValidationError);
    });
});

describe('Reference.from', () => {
    test('should build a reference from split parts', () => {
        const ref = Reference.from({
            registry: 'registry.test',
            repository: 'team/app',
            tag: 'v1',
            digest: DIGEST,
        });
        assert.isTrue(ref.equals(Reference.parse(`registry.test/team/app:v1@${DIGEST}`)));
    });

    test('should validate the tag', () => {
        assert.throws(
            () => Reference.from({ registry: 'registry.test', repository: 'team/app', tag: '-bad' }),
            ValidationError,
        );
    });

    test('should validate the registry', () => {
        assert.throws(
            () => Reference.from({ registry: 'bad host', repository: 'team/app' }),
            ValidationError,
        );
    });
});

describe('Reference', () => {
    test('repositoryForRegistry should add library/ for single-segment Docker Hub names', () => {
        const ref = Reference.parse('alpine');
        assert.equal(ref.repositoryForRegistry(true), 'library/alpine');
        assert.equal(ref.repositoryForRegistry(false), 'alpine');
    });

    test('repositoryForRegistry should leave other names alone', () => {
        assert.equal(Reference.parse('team/app').repositoryForRegistry(true), 'team/app');
        assert.equal(Reference.parse('ghcr.io/alpine').repositoryForRegistry(true), 'alpine');
    });

    test('withDigest should pin the reference', () => {
        const digest = Digest.parse(DIGEST);
        const ref = Reference.parse('registry.test/team/app:v1').withDigest(digest);
        assert.equal(ref.toString(), `registry.test/team/app:v1@${DIGEST}`);
    });

    test('equals should compare every part', () => {
        assert.isTrue(Reference.parse('team/app:v1').equals(Reference.parse('docker.io/team/app:v1')));
        assert.isFalse(Reference.parse('team/app:v1').equals(Reference.parse('team/app:v2')));
        assert.isFalse(Reference.parse('team/app').equals(Reference.parse(`team/app@${DIGEST}`)));
    });

    test('isDockerHub and sameRegistry should treat Docker Hub aliases as one registry', () => {
        assert.isTrue(isDockerHub('registry-1.docker.io'));
        assert.isFalse(isDockerHub('ghcr.io'));
        assert.isTrue(sameRegistry('docker.io', 'index.docker.io'));
        assert.isTrue(sameRegistry('Registry.Test', 'registry.test'));
        assert.isFalse(sameRegistry('registry.test', 'ghcr.io'));
    });
});
