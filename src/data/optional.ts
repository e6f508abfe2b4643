//----------------------------------------------------------------------------------------------------------------------
// Wrapper for a value that might or might not be present
//----------------------------------------------------------------------------------------------------------------------

export class Optional<T> {

    private static readonly EMPTY = new Optional<never>();

    //------------------------------------------------------------------------------------------------------------------
    // Initialisation
    //------------------------------------------------------------------------------------------------------------------

    private constructor(private readonly value?: T) { }

    //------------------------------------------------------------------------------------------------------------------
    // Create an Optional (null and undefined yield an empty one)
    //------------------------------------------------------------------------------------------------------------------

    public static of<T>(value: T): Optional<NonNullable<T>> {
        if (undefined !== value && null !== value) {
            return new Optional<NonNullable<T>>(value);
        } else {
            return Optional.EMPTY;
        }
    }

    //------------------------------------------------------------------------------------------------------------------
    // Create an empty Optional
    //------------------------------------------------------------------------------------------------------------------

    public static empty<T>(): Optional<NonNullable<T>> {
        return Optional.EMPTY;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Retrieve the value
    //------------------------------------------------------------------------------------------------------------------

    public get(): T | undefined {
        return this.value;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Retrieve the value or throw an exception if the Optional is empty
    //------------------------------------------------------------------------------------------------------------------

    public getOrThrow(): T {
        if (undefined === this.value) {
            throw new Error("The Optional is empty");
        } else {
            return this.value;
        }
    }

    //------------------------------------------------------------------------------------------------------------------
    // Retrieve the value or return the provided default if the Optional is empty
    //------------------------------------------------------------------------------------------------------------------

    public getOrDefault<D>(defaultValue: D): T | D {
        return undefined === this.value ? defaultValue : this.value;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Check if there is a value
    //------------------------------------------------------------------------------------------------------------------

    public isPresent() {
        return undefined !== this.value;
    }

    public isEmpty() {
        return undefined === this.value;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Map the value (if present) to another one
    //------------------------------------------------------------------------------------------------------------------

    public map<R>(mapper: (value: T) => R | undefined | null): Optional<NonNullable<R>> {
        return undefined === this.value ? Optional.EMPTY : Optional.of(mapper(this.value));
    }

    //------------------------------------------------------------------------------------------------------------------
    // Textual representation
    //------------------------------------------------------------------------------------------------------------------

    public toString(): string {
        return undefined === this.value ? "Optional.empty" : `Optional[${this.value}]`;
    }
}
