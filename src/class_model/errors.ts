export class ClassModelError extends Error {
    public constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class IllegalArgumentError extends ClassModelError {}

export class IllegalStateError extends ClassModelError {}

export class CatalogEntryMissingError extends ClassModelError {
    public readonly typeName: string;

    public constructor(typeName: string) {
        super('Index does not contain the annotation definition: ' + typeName);
        this.typeName = typeName;
    }
}

export class NotAnAnnotationTypeError extends ClassModelError {
    public readonly typeName: string;

    public constructor(typeName: string) {
        super('Not an annotation type: ' + typeName);
        this.typeName = typeName;
    }
}

/**
 * Thrown when an annotation target or a type descriptor is narrowed to a variant it is not.
 */
export class TargetKindError extends ClassModelError {}

/**
 * Thrown when an annotation value is read as a kind it does not hold,
 * or when a member a container must carry is missing.
 */
export class AnnotationValueKindError extends ClassModelError {}
