// src/widgets/options.ts
// Constructor-time option checks shared by all host widgets.

import type { BackendName } from '../config/types';
import { formatValidationMessages, validateWidgetOptions } from '../config/validator';
import { WidgetConfigError } from '../utils/errors';

/**
 * Throws a WidgetConfigError listing every invalid option.
 * Warnings (unknown keys) are logged and otherwise ignored.
 */
export function assertValidOptions(backend: BackendName, options: object): void {
    const result = validateWidgetOptions(backend, options);
    if (!result.valid) {
        throw new WidgetConfigError(`Invalid ${backend} widget options`, formatValidationMessages(result.errors));
    }
    formatValidationMessages(result.warnings).forEach(line => console.warn(`[config] ${backend}: ${line}`));
}
