import { FieldInfo } from './field_info';
import { FieldInternal, encodeName } from './field_internal';
import type { AnnotationInstance } from './annotation_instance';
import type { ClassInfo } from './class_info';
import type { ConstantValue } from './field_internal';
import type { Type } from './type';

/**
 * Staging side of a field for readers that allocate the field before its type and annotations
 * can be resolved. {@link field} is usable as an annotation target right away; after
 * {@link build} the setters throw `IllegalStateError`.
 */
export class FieldInfoBuilder {
    private readonly internal: FieldInternal;
    public readonly field: FieldInfo;

    public constructor(clazz: ClassInfo, name: Uint8Array | string, type: Type, flags: number) {
        const nameBytes = (typeof name === 'string') ? encodeName(name) : name;
        this.internal = new FieldInternal(nameBytes, type, flags);
        this.field = new FieldInfo(clazz, this.internal);
    }

    public setType(type: Type): this {
        this.internal.setType(type);
        return this;
    }

    public setAnnotations(annotations: readonly AnnotationInstance[]): this {
        this.internal.setAnnotations(annotations);
        return this;
    }

    public setConstantValue(value: ConstantValue | undefined): this {
        this.internal.setConstantValue(value);
        return this;
    }

    public isBuilt(): boolean {
        return this.internal.isFrozen();
    }

    public build(): FieldInfo {
        this.internal.freeze();
        return this.field;
    }
}
