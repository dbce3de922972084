import { IllegalArgumentError, TargetKindError } from './errors';
import { Modifiers } from './modifiers';
import { MethodParameterInfo } from './method_parameter_info';
import { resolveWithRepeatable } from './annotation_resolver';
import { AnnotationTargetKind } from './annotation_target';
import type { AnnotationTargetOps } from './annotation_target';
import type { AnnotationInstance } from './annotation_instance';
import type { AnnotationValue } from './annotation_value';
import type { ClassInfo } from './class_info';
import type { FieldInfo } from './field_info';
import type { RecordComponentInfo } from './record_component_info';
import type { Type } from './type';
import type { TypeCatalog } from './type_catalog';
import type { TypeTarget } from './type_target';

export interface MethodMembers {
    annotations: readonly AnnotationInstance[];
    parameterAnnotations: readonly (readonly AnnotationInstance[])[];
}

export class MethodInfo implements AnnotationTargetOps {
    public static readonly METHOD_PUBLIC = Modifiers.PUBLIC;
    public static readonly METHOD_PRIVATE = Modifiers.PRIVATE;
    public static readonly METHOD_PROTECTED = Modifiers.PROTECTED;
    public static readonly METHOD_STATIC = Modifiers.STATIC;
    public static readonly METHOD_FINAL = Modifiers.FINAL;
    public static readonly METHOD_SYNCHRONIZED = Modifiers.SYNCHRONIZED;
    public static readonly METHOD_BRIDGE = Modifiers.BRIDGE;
    public static readonly METHOD_VARARGS = Modifiers.VARARGS;
    public static readonly METHOD_NATIVE = Modifiers.NATIVE;
    public static readonly METHOD_ABSTRACT = Modifiers.ABSTRACT;
    public static readonly METHOD_STRICT = Modifiers.STRICT;
    public static readonly METHOD_SYNTHETIC = Modifiers.SYNTHETIC;

    private readonly clazz: ClassInfo;
    private readonly methodName: string;
    private readonly paramTypes: readonly Type[];
    private readonly retType: Type;
    private readonly accessFlag: number;
    private readonly paramNames: readonly (string | undefined)[];
    private readonly annotationDefault?: AnnotationValue;
    private readonly members: MethodMembers;
    private readonly params: readonly MethodParameterInfo[];

    public constructor(
        clazz: ClassInfo,
        name: string,
        parameterTypes: readonly Type[],
        returnType: Type,
        flags: number,
        parameterNames: readonly (string | undefined)[],
        defaultValue: AnnotationValue | undefined,
        members: MethodMembers
    ) {
        this.clazz = clazz;
        this.methodName = name;
        this.paramTypes = parameterTypes;
        this.retType = returnType;
        this.accessFlag = flags;
        this.paramNames = parameterNames;
        this.annotationDefault = defaultValue;
        this.members = members;
        this.params = Object.freeze(parameterTypes.map((_, position) => new MethodParameterInfo(this, position)));
    }

    public name(): string {
        return this.methodName;
    }

    public declaringClass(): ClassInfo {
        return this.clazz;
    }

    public parameterTypes(): readonly Type[] {
        return this.paramTypes;
    }

    public parameterType(position: number): Type {
        const type = this.paramTypes[position];
        if(!type)
            throw new IllegalArgumentError(this.methodName + ' has no parameter ' + position);
        return type;
    }

    /** Undefined when the class file carries no MethodParameters or LocalVariableTable entry. */
    public parameterName(position: number): string | undefined {
        return this.paramNames[position];
    }

    public parameters(): readonly MethodParameterInfo[] {
        return this.params;
    }

    public returnType(): Type {
        return this.retType;
    }

    public flags(): number {
        return this.accessFlag;
    }

    public kind(): AnnotationTargetKind.METHOD {
        return AnnotationTargetKind.METHOD;
    }

    public isSynthetic(): boolean {
        return Modifiers.isSynthetic(this.accessFlag);
    }

    public isConstructor(): boolean {
        return this.methodName === '<init>';
    }

    /** The AnnotationDefault attribute of an annotation member. */
    public defaultValue(): AnnotationValue | undefined {
        return this.annotationDefault;
    }

    public annotations(): readonly AnnotationInstance[] {
        return this.members.annotations;
    }

    public annotation(name: string): AnnotationInstance | undefined {
        return this.members.annotations.find(annotation => annotation.name() === name);
    }

    public hasAnnotation(name: string): boolean {
        return this.annotation(name) !== undefined;
    }

    public annotationsWithRepeatable(name: string, catalog: TypeCatalog): AnnotationInstance[] {
        return resolveWithRepeatable(this, name, catalog);
    }

    public parameterAnnotations(position: number): readonly AnnotationInstance[] {
        return this.members.parameterAnnotations[position] ?? [];
    }

    public asClass(): ClassInfo {
        throw new TargetKindError('Not a class');
    }

    public asField(): FieldInfo {
        throw new TargetKindError('Not a field');
    }

    public asMethod(): MethodInfo {
        return this;
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

    public toString(): string {
        const modifiers = Modifiers.methodModifiersToString(this.accessFlag);
        const params = this.paramTypes.map(type => type.toString()).join(', ');
        const declaration = this.retType.toString() + ' ' + this.clazz.name() + '.' + this.methodName + '(' + params + ')';
        return modifiers.length > 0 ? modifiers + ' ' + declaration : declaration;
    }
}
