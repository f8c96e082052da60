/**
 * Error taxonomy of the scraper.
 *
 * ContextLostError is handled inside the extraction engine; everything else is
 * turned into an Error result at the per-URL boundary.
 */
import { AppError } from '@digest/shared';

/**
 * The page or its player never became usable.
 */
export class NavigationError extends AppError {
    constructor(message: string, public readonly url: string) {
        super(message, 'NAVIGATION_FAILED', 502);
    }
}

/**
 * The extension iframe could not be located.
 */
export class SurfaceNotFoundError extends AppError {
    constructor(message: string = 'Extension iframe not found') {
        super(message, 'SURFACE_NOT_FOUND', 404);
    }
}

/**
 * The iframe was found but no section produced usable text.
 */
export class ExtractionEmptyError extends AppError {
    constructor(message: string = 'No section produced usable text') {
        super(message, 'EXTRACTION_EMPTY', 422);
    }
}

/**
 * The browser could not be started.
 */
export class ProvisionError extends AppError {
    constructor(message: string) {
        super(message, 'PROVISION_FAILED', 503);
    }
}

/**
 * The iframe the engine was working in is gone (typically remounted).
 */
export class ContextLostError extends AppError {
    constructor(message: string = 'Lost iframe context') {
        super(message, 'CONTEXT_LOST', 409);
    }
}
