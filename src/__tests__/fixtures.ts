import {
    AnnotationInstance,
    AnnotationValue,
    ArrayType,
    ClassInfoBuilder,
    ClassType,
    DotNames,
    PrimitiveType
} from '../index';

export const TAG = 'com.example.Tag';
export const TAGS = 'com.example.Tags';
export const MARKER = 'com.example.Marker';
export const PERSON = 'com.example.Person';

export function tag(value: string): AnnotationInstance {
    return AnnotationInstance.create(TAG, [AnnotationValue.createStringValue('value', value)]);
}

export function tags(...instances: AnnotationInstance[]): AnnotationInstance {
    const nested = instances.map(instance => AnnotationValue.createNestedAnnotationValue('', instance));
    return AnnotationInstance.create(TAGS, [AnnotationValue.createArrayValue('value', nested)]);
}

export function marker(): AnnotationInstance {
    return AnnotationInstance.create(MARKER);
}

// @Repeatable(Tags.class) @interface Tag { String value(); int priority() default 5; }
export const tagClass = ClassInfoBuilder.annotationType(TAG)
    .addAnnotation(AnnotationInstance.create(DotNames.REPEATABLE, [
        AnnotationValue.createClassValue('value', ClassType.create(TAGS))
    ]))
    .addMethod({ name: 'value', returnType: ClassType.STRING })
    .addMethod({
        name: 'priority',
        returnType: PrimitiveType.INT,
        defaultValue: AnnotationValue.createIntegerValue('priority', 5)
    })
    .build();

export const tagsClass = ClassInfoBuilder.annotationType(TAGS)
    .addMethod({ name: 'value', returnType: ArrayType.create(ClassType.create(TAG)) })
    .build();

export const markerClass = ClassInfoBuilder.annotationType(MARKER).build();
