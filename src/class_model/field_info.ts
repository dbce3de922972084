import { Equal, Hash, pipe } from 'effect';
import { IllegalArgumentError, TargetKindError } from './errors';
import { FieldInternal, encodeName } from './field_internal';
import { Modifiers } from './modifiers';
import { resolveWithRepeatable } from './annotation_resolver';
import { AnnotationTargetKind } from './annotation_target';
import type { AnnotationTargetOps } from './annotation_target';
import type { AnnotationInstance } from './annotation_instance';
import type { ClassInfo } from './class_info';
import type { ConstantValue } from './field_internal';
import type { MethodInfo } from './method_info';
import type { MethodParameterInfo } from './method_parameter_info';
import type { RecordComponentInfo } from './record_component_info';
import type { Type } from './type';
import type { TypeCatalog } from './type_catalog';
import type { TypeTarget } from './type_target';

/**
 * A field declared by a class.
 *
 * Instances are shared between the declaring class and every annotation targeting the field.
 * Once the staging builder has built it, a field never changes.
 */
export class FieldInfo implements AnnotationTargetOps, Equal.Equal {
    public static readonly FIELD_PUBLIC = Modifiers.PUBLIC;
    public static readonly FIELD_PRIVATE = Modifiers.PRIVATE;
    public static readonly FIELD_PROTECTED = Modifiers.PROTECTED;
    public static readonly FIELD_STATIC = Modifiers.STATIC;
    public static readonly FIELD_FINAL = Modifiers.FINAL;
    public static readonly FIELD_VOLATILE = Modifiers.VOLATILE;
    public static readonly FIELD_TRANSIENT = Modifiers.TRANSIENT;
    public static readonly FIELD_SYNTHETIC = Modifiers.SYNTHETIC;
    public static readonly FIELD_ENUM = Modifiers.ENUM;

    private readonly clazz: ClassInfo;
    private readonly internal: FieldInternal;

    /** Used by `FieldInfoBuilder`; other callers go through {@link FieldInfo.create}. */
    public constructor(clazz: ClassInfo, internal: FieldInternal) {
        this.clazz = clazz;
        this.internal = internal;
    }

    /**
     * Creates a mock field in one step, e.g. for tooling that synthesizes members.
     */
    public static create(clazz: ClassInfo | null | undefined, name: string | null | undefined, type: Type, flags: number): FieldInfo {
        if(!clazz)
            throw new IllegalArgumentError('Clazz can\'t be null');
        if(name === null || name === undefined)
            throw new IllegalArgumentError('Name can\'t be null');
        if(name.length === 0)
            throw new IllegalArgumentError('Name can\'t be empty');
        const internal = new FieldInternal(encodeName(name), type, flags);
        internal.freeze();
        return new FieldInfo(clazz, internal);
    }

    public name(): string {
        return this.internal.name();
    }

    /** A copy of the UTF-8 encoded name as stored in the class file. */
    public nameUtf8(): Buffer {
        return this.internal.nameUtf8();
    }

    public declaringClass(): ClassInfo {
        return this.clazz;
    }

    /** May be a primitive, an array, a class or a parameterized type. */
    public type(): Type {
        return this.internal.type();
    }

    public flags(): number {
        return this.internal.flags();
    }

    public kind(): AnnotationTargetKind.FIELD {
        return AnnotationTargetKind.FIELD;
    }

    public isEnumConstant(): boolean {
        return (this.flags() & Modifiers.ENUM) !== 0;
    }

    public isSynthetic(): boolean {
        return Modifiers.isSynthetic(this.flags());
    }

    public isStatic(): boolean {
        return Modifiers.isStatic(this.flags());
    }

    /** The ConstantValue attribute of a static final field, if any. */
    public constantValue(): ConstantValue | undefined {
        return this.internal.constantValue();
    }

    /** Never undefined; empty when the field carries no annotation. */
    public annotations(): readonly AnnotationInstance[] {
        return this.internal.annotations();
    }

    public annotation(name: string): AnnotationInstance | undefined {
        return this.internal.annotation(name);
    }

    /**
     * Annotation instances of the given type, looking through the container annotation when
     * the type is repeatable and not present directly.
     *
     * @throws CatalogEntryMissingError if the catalog does not know the annotation type
     * @throws NotAnAnnotationTypeError if the name resolves to a type that is not an annotation
     */
    public annotationsWithRepeatable(name: string, catalog: TypeCatalog): AnnotationInstance[] {
        return resolveWithRepeatable(this, name, catalog);
    }

    public hasAnnotation(name: string): boolean {
        return this.internal.hasAnnotation(name);
    }

    public asClass(): ClassInfo {
        throw new TargetKindError('Not a class');
    }

    public asField(): FieldInfo {
        return this;
    }

    public asMethod(): MethodInfo {
        throw new TargetKindError('Not a method');
    }

    public asMethodParameter(): MethodParameterInfo {
        throw new TargetKindError('Not a method parameter');
    }

    public asType(): TypeTarget {
        throw new TargetKindError('Not a type');
    }

    public asRecordComponent(): RecordComponentInfo {
        throw new TargetKindError('Not a record component');
    }

    /** Similar to, but not necessarily the same as, the Java source declaration of the field. */
    public toString(): string {
        const modifiers = Modifiers.fieldModifiersToString(this.flags());
        const declaration = this.type().toString() + ' ' + this.clazz.name() + '.' + this.name();
        return modifiers.length > 0 ? modifiers + ' ' + declaration : declaration;
    }

    public [Equal.symbol](that: Equal.Equal): boolean {
        return that instanceof FieldInfo &&
            Equal.equals(that.clazz, this.clazz) &&
            Equal.equals(that.internal, this.internal);
    }

    public [Hash.symbol](): number {
        return pipe(Hash.hash(this.clazz), Hash.combine(Hash.hash(this.internal)));
    }
}
