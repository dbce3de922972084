import { AnnotationValueKindError, CatalogEntryMissingError, NotAnAnnotationTypeError } from './errors';
import { DotNames } from './dot_names';
import type { AnnotationInstance } from './annotation_instance';
import type { AnnotationValue } from './annotation_value';
import type { TypeCatalog } from './type_catalog';

/**
 * Anything exposing direct lookup of its own annotations by type name.
 */
export interface AnnotationLookup {
    annotation(name: string): AnnotationInstance | undefined;
}

function requireValue(instance: AnnotationInstance, member: string): AnnotationValue {
    const value = instance.value(member);
    if(!value)
        throw new AnnotationValueKindError(instance.toString() + ' has no member ' + member);
    return value;
}

/**
 * Returns the occurrences of an annotation type on a target, expanding the container of a
 * repeatable annotation (JLS 9.6.3).
 *
 * A direct occurrence wins and is returned alone, even if a container is attached as well.
 * Otherwise the instances held by the container are returned in their stored order, without
 * deduplication. The result is empty when the type is not repeatable or no container is present.
 *
 * @throws CatalogEntryMissingError if the catalog does not know `name`
 * @throws NotAnAnnotationTypeError if `name` is not an annotation type
 * @throws AnnotationValueKindError if `@Repeatable` or the container is malformed
 */
export function resolveWithRepeatable(target: AnnotationLookup, name: string, catalog: TypeCatalog): AnnotationInstance[] {
    const direct = target.annotation(name);
    if(direct)
        return [direct];

    const annotationClass = catalog.getClassByName(name);
    if(!annotationClass)
        throw new CatalogEntryMissingError(name);
    if(!annotationClass.isAnnotation())
        throw new NotAnAnnotationTypeError(annotationClass.name());

    const repeatable = annotationClass.classAnnotation(DotNames.REPEATABLE);
    if(!repeatable)
        return [];

    const containerType = requireValue(repeatable, DotNames.VALUE_MEMBER).asClass();
    const container = target.annotation(containerType.name());
    if(!container)
        return [];

    return requireValue(container, DotNames.VALUE_MEMBER).asNestedArray();
}
