export { AnnotationInstance } from './class_model/annotation_instance';
export { resolveWithRepeatable } from './class_model/annotation_resolver';
export type { AnnotationLookup } from './class_model/annotation_resolver';
export { AnnotationTargetKind } from './class_model/annotation_target';
export type { AnnotationTarget, AnnotationTargetOps } from './class_model/annotation_target';
export {
    AnnotationValue,
    AnnotationValueKind,
    ArrayValue,
    BooleanValue,
    ByteValue,
    CharacterValue,
    ClassValue,
    DoubleValue,
    EnumValue,
    FloatValue,
    IntegerValue,
    LongValue,
    NestedAnnotationValue,
    NumericValue,
    ShortValue,
    StringValue
} from './class_model/annotation_value';
export { ClassInfo } from './class_model/class_info';
export type { ClassMembers } from './class_model/class_info';
export { ClassInfoBuilder } from './class_model/class_info_builder';
export type { FieldDefinition, MethodDefinition, RecordComponentDefinition } from './class_model/class_info_builder';
export { DotNames } from './class_model/dot_names';
export {
    AnnotationValueKindError,
    CatalogEntryMissingError,
    ClassModelError,
    IllegalArgumentError,
    IllegalStateError,
    NotAnAnnotationTypeError,
    TargetKindError
} from './class_model/errors';
export { FieldInfo } from './class_model/field_info';
export { FieldInfoBuilder } from './class_model/field_info_builder';
export type { ConstantValue } from './class_model/field_internal';
export { MethodInfo } from './class_model/method_info';
export { MethodParameterInfo } from './class_model/method_parameter_info';
export { Modifiers } from './class_model/modifiers';
export { RecordComponentInfo } from './class_model/record_component_info';
export {
    ArrayType,
    ClassType,
    ParameterizedType,
    PrimitiveType,
    TypeDescriptor,
    TypeKind,
    VoidType
} from './class_model/type';
export type { Type } from './class_model/type';
export { MemoryTypeCatalog } from './class_model/type_catalog';
export type { TypeCatalog } from './class_model/type_catalog';
export { TypeTarget, TypeTargetUsage } from './class_model/type_target';
