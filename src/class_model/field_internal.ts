import { Array as Arr, Equal, Hash, pipe } from 'effect';
import { IllegalArgumentError, IllegalStateError } from './errors';
import type { AnnotationInstance } from './annotation_instance';
import type { Type } from './type';

export type ConstantValue = number | bigint | string;

/**
 * UTF-8 bytes of a field name. A name holding a lone surrogate has no UTF-8 form and is rejected.
 */
export function encodeName(name: string): Buffer {
    const bytes = Buffer.from(name, 'utf-8');
    if(bytes.toString('utf-8') !== name)
        throw new IllegalArgumentError('Name is not valid UTF-16: ' + JSON.stringify(name));
    return bytes;
}

const annotationsEquivalence = Arr.getEquivalence(Equal.equivalence<AnnotationInstance>());

/**
 * The owner-independent part of a field: name, type, flags and annotations. Type and
 * annotations may be replaced until {@link freeze} is called by the staging builder.
 */
export class FieldInternal implements Equal.Equal {
    private readonly nameBytes: Buffer;
    private fieldType: Type;
    private readonly accessFlags: number;
    private fieldAnnotations: readonly AnnotationInstance[] = [];
    private constValue?: ConstantValue;
    private frozen = false;

    public constructor(nameBytes: Uint8Array, type: Type, flags: number) {
        this.nameBytes = Buffer.from(nameBytes);
        this.fieldType = type;
        this.accessFlags = flags;
    }

    public name(): string {
        return this.nameBytes.toString('utf-8');
    }

    public nameUtf8(): Buffer {
        return Buffer.from(this.nameBytes);
    }

    public type(): Type {
        return this.fieldType;
    }

    public flags(): number {
        return this.accessFlags;
    }

    public annotations(): readonly AnnotationInstance[] {
        return this.fieldAnnotations;
    }

    public annotation(name: string): AnnotationInstance | undefined {
        for(let i = 0; i < this.fieldAnnotations.length; i++) {
            if(this.fieldAnnotations[i].name() === name)
                return this.fieldAnnotations[i];
        }
        return undefined;
    }

    public hasAnnotation(name: string): boolean {
        return this.annotation(name) !== undefined;
    }

    public constantValue(): ConstantValue | undefined {
        return this.constValue;
    }

    public isFrozen(): boolean {
        return this.frozen;
    }

    public setType(type: Type) {
        this.checkMutable();
        this.fieldType = type;
    }

    public setAnnotations(annotations: readonly AnnotationInstance[]) {
        this.checkMutable();
        this.fieldAnnotations = Object.freeze([...annotations]);
    }

    public setConstantValue(value: ConstantValue | undefined) {
        this.checkMutable();
        this.constValue = value;
    }

    public freeze() {
        this.frozen = true;
    }

    private checkMutable() {
        if(this.frozen)
            throw new IllegalStateError('Field ' + this.name() + ' is already built');
    }

    public [Equal.symbol](that: Equal.Equal): boolean {
        return that instanceof FieldInternal &&
            that.accessFlags === this.accessFlags &&
            that.nameBytes.equals(this.nameBytes) &&
            Equal.equals(that.fieldType, this.fieldType) &&
            annotationsEquivalence(that.fieldAnnotations, this.fieldAnnotations);
    }

    public [Hash.symbol](): number {
        return pipe(
            Hash.string(this.name()),
            Hash.combine(Hash.hash(this.fieldType)),
            Hash.combine(Hash.number(this.accessFlags)),
            Hash.combine(Hash.array(this.fieldAnnotations))
        );
    }
}
