import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig } from '../config.js';
import { imageModelName } from '../llm/google/models.js';

describe('loadConfig', () => {
    it('should apply defaults around the API key', () => {
        const config = loadConfig({ GOOGLE_API_KEY: 'test-secret' });

        expect(config).toEqual({
            apiKey: 'test-secret',
            port: 8000,
            staticDir: path.resolve('static'),
            imageModel: imageModelName,
            logLevel: 'info',
        });
    });

    it('should fall back to GEMINI_API_KEY', () => {
        expect(loadConfig({ GEMINI_API_KEY: 'test-secret-2' }).apiKey).toBe('test-secret-2');
        expect(loadConfig({ GOOGLE_API_KEY: 'test-secret', GEMINI_API_KEY: 'test-secret-2' }).apiKey).toBe('test-secret');
    });

    it('should read overrides from the environment', () => {
        const config = loadConfig({
            GOOGLE_API_KEY: 'test-secret',
            PORT: '9100',
            STATIC_DIR: '/tmp/studio-static',
            IMAGE_MODEL: 'gemini-test-image',
            LOG_LEVEL: 'debug',
        });

        expect(config.port).toBe(9100);
        expect(config.staticDir).toBe('/tmp/studio-static');
        expect(config.imageModel).toBe('gemini-test-image');
        expect(config.logLevel).toBe('debug');
    });

    it('should require an API key', () => {
        expect(() => loadConfig({})).toThrow('The GOOGLE_API_KEY (or GEMINI_API_KEY) environment variable is required.');
        expect(() => loadConfig({ GOOGLE_API_KEY: '   ' })).toThrow('GOOGLE_API_KEY');
    });

    it('should reject an invalid port', () => {
        expect(() => loadConfig({ GOOGLE_API_KEY: 'test-secret', PORT: 'eighty' })).toThrow(/Invalid environment configuration: PORT/);
    });
});
