/** Raised before a run starts when options cannot describe a valid search. */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/** Raised when a layout is not a bijection from the alphabet onto enabled slots. */
export class LayoutValidationError extends Error {
    readonly violations: string[];

    constructor(violations: string[]) {
        super(`Invalid layout: ${violations.join('; ')}`);
        this.name = 'LayoutValidationError';
        this.violations = violations;
    }
}
