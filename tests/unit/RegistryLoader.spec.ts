/**
 * Unit Tests: Security rules loading
 *
 * @see libs/security/registryLoader.ts
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { EndpointSecurityRegistry, loadSecurityRules, readSecurityRules } from '../../libs/security/index.js';

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe('Security rules loader', () => {
    let tmpDir: string;

    before(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'security-rules-'));
    });

    after(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should read and normalize every rule', () => {
        const { rules, digest } = readSecurityRules(fixture('security-rules.json'));

        assert.strictEqual(rules.length, 3);
        assert.strictEqual(digest.length, 64);
        assert.strictEqual(rules[0]?.verb, 'GET');
        assert.deepStrictEqual([...(rules[0]?.requirement.roles ?? [])], ['owner', 'account_viewer']);
        assert.strictEqual(rules[0]?.requirement.requiresAuthentication, true);
        assert.strictEqual(rules[1]?.requirement.requireAllPermissions, true);
        assert.strictEqual(rules[2]?.requirement.allowAnonymous, true);
    });

    it('should register the rules into the registry', () => {
        const registry = new EndpointSecurityRegistry();

        const count = loadSecurityRules(registry, fixture('security-rules.json'));

        assert.strictEqual(count, 3);
        assert.strictEqual(registry.isRegistered('/contracts/{contractId}', 'GET'), true);
        assert.strictEqual(registry.get('/status', 'GET')?.allowAnonymous, true);
    });

    it('should reject rules that fail validation', () => {
        assert.throws(() => readSecurityRules(fixture('security-rules.invalid.json')), { name: 'ValidationError' });
    });

    it('should reject files that are not JSON', () => {
        const file = path.join(tmpDir, 'broken.json');
        fs.writeFileSync(file, '{ "version": ');

        assert.throws(() => readSecurityRules(file), /is not valid JSON/);
    });

    it('should reject a missing file', () => {
        assert.throws(() => readSecurityRules(path.join(tmpDir, 'absent.json')), /Security rules file missing/);
    });
});
