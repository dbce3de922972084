import type { ClassInfo } from './class_info';
import type { FieldInfo } from './field_info';
import type { MethodInfo } from './method_info';
import type { MethodParameterInfo } from './method_parameter_info';
import type { RecordComponentInfo } from './record_component_info';
import type { TypeTarget } from './type_target';

export enum AnnotationTargetKind {
    CLASS,
    FIELD,
    METHOD,
    METHOD_PARAMETER,
    TYPE,
    RECORD_COMPONENT
}

export type AnnotationTarget =
    ClassInfo |
    FieldInfo |
    MethodInfo |
    MethodParameterInfo |
    TypeTarget |
    RecordComponentInfo;

/**
 * Narrowing operations shared by every annotation target. Each variant answers only its own
 * `asX()`; the others throw `TargetKindError`.
 */
export interface AnnotationTargetOps {
    kind(): AnnotationTargetKind;
    asClass(): ClassInfo;
    asField(): FieldInfo;
    asMethod(): MethodInfo;
    asMethodParameter(): MethodParameterInfo;
    asType(): TypeTarget;
    asRecordComponent(): RecordComponentInfo;
}
