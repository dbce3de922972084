import { Array as Arr, Equal, Hash, pipe } from 'effect';
import { CatalogEntryMissingError } from './errors';
import { DotNames } from './dot_names';
import type { AnnotationTarget } from './annotation_target';
import type { AnnotationValue } from './annotation_value';
import type { TypeCatalog } from './type_catalog';

const valuesEquivalence = Arr.getEquivalence(Equal.equivalence<AnnotationValue>());

/**
 * A concrete occurrence of an annotation. Equality covers the annotation type name and the
 * member values; the target is not part of it.
 */
export class AnnotationInstance implements Equal.Equal {
    private readonly typeName: string;
    private readonly memberValues: readonly AnnotationValue[];
    private readonly annotationTarget?: AnnotationTarget;

    private constructor(typeName: string, values: readonly AnnotationValue[], target?: AnnotationTarget) {
        this.typeName = typeName;
        this.memberValues = values;
        this.annotationTarget = target;
    }

    public static create(typeName: string, values: readonly AnnotationValue[] = [], target?: AnnotationTarget): AnnotationInstance {
        return new AnnotationInstance(typeName, Object.freeze([...values]), target);
    }

    public name(): string {
        return this.typeName;
    }

    /** The declaration this annotation is attached to; undefined for nested annotations. */
    public target(): AnnotationTarget | undefined {
        return this.annotationTarget;
    }

    public withTarget(target: AnnotationTarget): AnnotationInstance {
        return new AnnotationInstance(this.typeName, this.memberValues, target);
    }

    public value(member: string = DotNames.VALUE_MEMBER): AnnotationValue | undefined {
        for(let i = 0; i < this.memberValues.length; i++) {
            if(this.memberValues[i].name === member)
                return this.memberValues[i];
        }
        return undefined;
    }

    public values(): readonly AnnotationValue[] {
        return this.memberValues;
    }

    /**
     * Returns the explicitly bound value of a member, or else the default declared on the
     * annotation type, which must be known to the catalog.
     */
    public valueWithDefault(catalog: TypeCatalog, member: string = DotNames.VALUE_MEMBER): AnnotationValue | undefined {
        const declared = this.value(member);
        if(declared)
            return declared;
        const definition = catalog.getClassByName(this.typeName);
        if(!definition)
            throw new CatalogEntryMissingError(this.typeName);
        return definition.method(member)?.defaultValue();
    }

    public toString(): string {
        if(this.memberValues.length === 0)
            return '@' + this.typeName;
        return '@' + this.typeName + '(' + this.memberValues.map(value => value.toString()).join(', ') + ')';
    }

    public [Equal.symbol](that: Equal.Equal): boolean {
        return that instanceof AnnotationInstance &&
            that.typeName === this.typeName &&
            valuesEquivalence(that.memberValues, this.memberValues);
    }

    public [Hash.symbol](): number {
        return pipe(Hash.string(this.typeName), Hash.combine(Hash.array(this.memberValues)));
    }
}
