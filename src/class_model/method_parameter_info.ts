import { TargetKindError } from './errors';
import { resolveWithRepeatable } from './annotation_resolver';
import { AnnotationTargetKind } from './annotation_target';
import type { AnnotationTargetOps } from './annotation_target';
import type { AnnotationInstance } from './annotation_instance';
import type { ClassInfo } from './class_info';
import type { FieldInfo } from './field_info';
import type { MethodInfo } from './method_info';
import type { RecordComponentInfo } from './record_component_info';
import type { Type } from './type';
import type { TypeCatalog } from './type_catalog';
import type { TypeTarget } from './type_target';

export class MethodParameterInfo implements AnnotationTargetOps {
    public readonly position: number;
    private readonly methodInfo: MethodInfo;

    public constructor(method: MethodInfo, position: number) {
        this.methodInfo = method;
        this.position = position;
    }

    public method(): MethodInfo {
        return this.methodInfo;
    }

    public name(): string | undefined {
        return this.methodInfo.parameterName(this.position);
    }

    public type(): Type {
        return this.methodInfo.parameterType(this.position);
    }

    public kind(): AnnotationTargetKind.METHOD_PARAMETER {
        return AnnotationTargetKind.METHOD_PARAMETER;
    }

    public annotations(): readonly AnnotationInstance[] {
        return this.methodInfo.parameterAnnotations(this.position);
    }

    public annotation(name: string): AnnotationInstance | undefined {
        return this.annotations().find(annotation => annotation.name() === name);
    }

    public annotationsWithRepeatable(name: string, catalog: TypeCatalog): AnnotationInstance[] {
        return resolveWithRepeatable(this, name, catalog);
    }

    public asClass(): ClassInfo {
        throw new TargetKindError('Not a class');
    }

    public asField(): FieldInfo {
        throw new TargetKindError('Not a field');
    }

    public asMethod(): MethodInfo {
        throw new TargetKindError('Not a method');
    }

    public asMethodParameter(): MethodParameterInfo {
        return this;
    }

    public asType(): TypeTarget {
        throw new TargetKindError('Not a type');
    }

    public asRecordComponent(): RecordComponentInfo {
        throw new TargetKindError('Not a record component');
    }

    public toString(): string {
        return this.methodInfo.toString() + ' #' + this.position;
    }
}
