import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
    it('should apply defaults', () => {
        expect(loadConfig({})).toEqual({
            port: 3002,
            tokenUrl: 'http://localhost:3001/token',
            streamingUrl: 'wss://streaming.assemblyai.com/v3/ws',
            apiKeys: [],
            recorder: 'sox',
            audioDevice: undefined,
            dataDir: './data',
            tokenTimeoutMs: 10000,
            connectTimeoutMs: 10000,
            errorDisplayMs: 5000,
        });
    });

    it('should split seed keys on commas', () => {
        const config = loadConfig({ TRANSCRIPTION_API_KEYS: ' test-key-a, test-key-b,, ' });
        expect(config.apiKeys).toEqual(['test-key-a', 'test-key-b']);
    });

    it('should treat blank values as unset', () => {
        const config = loadConfig({ AGENT_PORT: '', AUDIO_DEVICE: '  ', TOKEN_TIMEOUT_MS: '' });

        expect(config.port).toBe(3002);
        expect(config.audioDevice).toBeUndefined();
        expect(config.tokenTimeoutMs).toBe(10000);
    });

    it('should coerce numeric values', () => {
        const config = loadConfig({ AGENT_PORT: '4010', ERROR_DISPLAY_MS: '0', AUDIO_RECORDER: 'ffmpeg' });

        expect(config.port).toBe(4010);
        expect(config.errorDisplayMs).toBe(0);
        expect(config.recorder).toBe('ffmpeg');
    });

    it('should list every invalid variable', () => {
        let caught: unknown;
        try {
            loadConfig({ AGENT_PORT: 'abc', AUDIO_RECORDER: 'vlc' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigError);
        if (!(caught instanceof ConfigError)) return;
        expect(caught.code).toBe('CONFIG');
        expect(caught.issues).toHaveLength(2);
        expect(caught.issues[0]).toMatch(/^AGENT_PORT: /);
        expect(caught.issues[1]).toMatch(/^AUDIO_RECORDER: /);
    });
});
