import { describe, it, expect } from 'vitest';
import { AppError, ConfigError, ValidationError, toErrorMessage } from '../src/errors';

describe('errors', () => {
    it('should carry code and status', () => {
        const error = new AppError('boom', 'SOMETHING', 418);

        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('AppError');
        expect(error.code).toBe('SOMETHING');
        expect(error.statusCode).toBe(418);
        expect(error.isOperational).toBe(true);
    });

    it('should name subclasses after themselves', () => {
        const config = new ConfigError('bad config');
        const validation = new ValidationError('bad input', { field: 'url' });

        expect(config.name).toBe('ConfigError');
        expect(config.code).toBe('CONFIG_ERROR');
        expect(config.isOperational).toBe(false);
        expect(validation).toBeInstanceOf(AppError);
        expect(validation.details).toEqual({ field: 'url' });
    });

    it('should turn anything thrown into a message', () => {
        expect(toErrorMessage(new Error('plain'))).toBe('plain');
        expect(toErrorMessage('text')).toBe('text');
        expect(toErrorMessage(42)).toBe('42');
    });
});
