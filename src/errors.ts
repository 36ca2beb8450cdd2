/** A player or camera query did not hold exactly one entity. */
export class SingletonViolationError extends Error {
    constructor(
        readonly label: string,
        readonly found: number,
    ) {
        super(`Expected exactly one ${label}, found ${found}.`);
        this.name = "SingletonViolationError";
    }
}
