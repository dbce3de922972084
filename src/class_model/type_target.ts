import { TargetKindError } from './errors';
import { AnnotationTargetKind } from './annotation_target';
import type { AnnotationTarget, AnnotationTargetOps } from './annotation_target';
import type { ClassInfo } from './class_info';
import type { FieldInfo } from './field_info';
import type { MethodInfo } from './method_info';
import type { MethodParameterInfo } from './method_parameter_info';
import type { RecordComponentInfo } from './record_component_info';
import type { Type } from './type';

/**
 * Where a type-use annotation sits within its enclosing declaration.
 */
export enum TypeTargetUsage {
    EMPTY,
    CLASS_EXTENDS,
    METHOD_PARAMETER,
    TYPE_PARAMETER,
    TYPE_PARAMETER_BOUND,
    THROWS
}

/**
 * A type use inside a declaration, e.g. the `String` in `List<@NotNull String> names`.
 */
export class TypeTarget implements AnnotationTargetOps {
    private readonly enclosing: AnnotationTarget;
    private readonly targetType: Type;
    public readonly usage: TypeTargetUsage;

    public constructor(enclosing: AnnotationTarget, target: Type, usage: TypeTargetUsage = TypeTargetUsage.EMPTY) {
        this.enclosing = enclosing;
        this.targetType = target;
        this.usage = usage;
    }

    public enclosingTarget(): AnnotationTarget {
        return this.enclosing;
    }

    public target(): Type {
        return this.targetType;
    }

    public kind(): AnnotationTargetKind.TYPE {
        return AnnotationTargetKind.TYPE;
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
        throw new TargetKindError('Not a method parameter');
    }

    public asType(): TypeTarget {
        return this;
    }

    public asRecordComponent(): RecordComponentInfo {
        throw new TargetKindError('Not a record component');
    }

    public toString(): string {
        return this.targetType.toString() + ' in ' + this.enclosing.toString();
    }
}
