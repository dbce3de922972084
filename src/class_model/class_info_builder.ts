import { ClassInfo } from './class_info';
import { DotNames } from './dot_names';
import { FieldInfoBuilder } from './field_info_builder';
import { IllegalStateError } from './errors';
import { MethodInfo } from './method_info';
import { Modifiers } from './modifiers';
import { RecordComponentInfo } from './record_component_info';
import { VoidType } from './type';
import type { AnnotationInstance } from './annotation_instance';
import type { AnnotationValue } from './annotation_value';
import type { ClassMembers } from './class_info';
import type { ConstantValue } from './field_internal';
import type { FieldInfo } from './field_info';
import type { MethodMembers } from './method_info';
import type { RecordComponentMembers } from './record_component_info';
import type { Type } from './type';

export interface FieldDefinition {
    name: string;
    type: Type;
    flags: number;
    annotations?: readonly AnnotationInstance[];
    constantValue?: ConstantValue;
}

export interface MethodDefinition {
    name: string;
    parameterTypes?: readonly Type[];
    returnType?: Type;
    flags?: number;
    parameterNames?: readonly (string | undefined)[];
    annotations?: readonly AnnotationInstance[];
    parameterAnnotations?: readonly (readonly AnnotationInstance[])[];
    defaultValue?: AnnotationValue;
}

export interface RecordComponentDefinition {
    name: string;
    type: Type;
    annotations?: readonly AnnotationInstance[];
}

/**
 * Collects the declarations of one class and allocates the class, its members and their
 * annotations in one pass. Every annotation handed in is re-targeted at the record it ends up on.
 */
export class ClassInfoBuilder {
    private readonly name: string;
    private readonly flags: number;
    private superName?: string;
    private interfaceNames: string[] = [];
    private readonly annotations: AnnotationInstance[] = [];
    private readonly fields: FieldDefinition[] = [];
    private readonly methods: MethodDefinition[] = [];
    private readonly recordComponents: RecordComponentDefinition[] = [];
    private built = false;

    public constructor(name: string, flags: number = Modifiers.PUBLIC | ClassInfo.CLASS_SUPER) {
        this.name = name;
        this.flags = flags;
        if(name !== DotNames.OBJECT)
            this.superName = DotNames.OBJECT;
    }

    /** Presets the flags and super interface javac gives an `@interface`. */
    public static annotationType(name: string): ClassInfoBuilder {
        const flags = Modifiers.PUBLIC | Modifiers.INTERFACE | Modifiers.ABSTRACT | Modifiers.ANNOTATION;
        return new ClassInfoBuilder(name, flags).setInterfaceNames([DotNames.ANNOTATION]);
    }

    public setSuperName(superName: string | undefined): this {
        this.superName = superName;
        return this;
    }

    public setInterfaceNames(interfaceNames: readonly string[]): this {
        this.interfaceNames = [...interfaceNames];
        return this;
    }

    public addAnnotation(...annotations: AnnotationInstance[]): this {
        this.annotations.push(...annotations);
        return this;
    }

    public addField(field: FieldDefinition): this {
        this.fields.push(field);
        return this;
    }

    public addMethod(method: MethodDefinition): this {
        this.methods.push(method);
        return this;
    }

    public addRecordComponent(component: RecordComponentDefinition): this {
        this.recordComponents.push(component);
        return this;
    }

    public build(): ClassInfo {
        if(this.built)
            throw new IllegalStateError('Class ' + this.name + ' is already built');
        this.built = true;

        const members: ClassMembers = { annotations: [], fields: [], methods: [], recordComponents: [] };
        const clazz = new ClassInfo(this.name, this.flags, this.superName, Object.freeze([...this.interfaceNames]), members);

        members.annotations = Object.freeze(this.annotations.map(annotation => annotation.withTarget(clazz)));
        members.fields = Object.freeze(this.fields.map(definition => ClassInfoBuilder.buildField(clazz, definition)));
        members.methods = Object.freeze(this.methods.map(definition => ClassInfoBuilder.buildMethod(clazz, definition)));
        members.recordComponents = Object.freeze(this.recordComponents.map(definition => ClassInfoBuilder.buildRecordComponent(clazz, definition)));
        return clazz;
    }

    private static buildField(clazz: ClassInfo, definition: FieldDefinition): FieldInfo {
        const builder = new FieldInfoBuilder(clazz, definition.name, definition.type, definition.flags);
        const annotations = definition.annotations ?? [];
        builder.setAnnotations(annotations.map(annotation => annotation.withTarget(builder.field)));
        builder.setConstantValue(definition.constantValue);
        return builder.build();
    }

    private static buildMethod(clazz: ClassInfo, definition: MethodDefinition): MethodInfo {
        const parameterTypes = Object.freeze([...(definition.parameterTypes ?? [])]);
        const methodMembers: MethodMembers = { annotations: [], parameterAnnotations: [] };
        const method = new MethodInfo(
            clazz,
            definition.name,
            parameterTypes,
            definition.returnType ?? VoidType.VOID,
            definition.flags ?? Modifiers.PUBLIC,
            Object.freeze([...(definition.parameterNames ?? [])]),
            definition.defaultValue,
            methodMembers
        );
        const annotations = definition.annotations ?? [];
        methodMembers.annotations = Object.freeze(annotations.map(annotation => annotation.withTarget(method)));
        const parameters = method.parameters();
        const parameterAnnotations = definition.parameterAnnotations ?? [];
        methodMembers.parameterAnnotations = Object.freeze(parameters.map(parameter => {
            const list = parameterAnnotations[parameter.position] ?? [];
            return Object.freeze(list.map(annotation => annotation.withTarget(parameter)));
        }));
        return method;
    }

    private static buildRecordComponent(clazz: ClassInfo, definition: RecordComponentDefinition): RecordComponentInfo {
        const componentMembers: RecordComponentMembers = { annotations: [] };
        const component = new RecordComponentInfo(clazz, definition.name, definition.type, componentMembers);
        const annotations = definition.annotations ?? [];
        componentMembers.annotations = Object.freeze(annotations.map(annotation => annotation.withTarget(component)));
        return component;
    }
}
