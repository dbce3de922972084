import { Array as Arr, Equal, Hash, pipe } from 'effect';
import { AnnotationValueKindError } from './errors';
import { DotNames } from './dot_names';
import type { AnnotationInstance } from './annotation_instance';
import type { Type } from './type';

export enum AnnotationValueKind {
    BYTE,
    SHORT,
    INTEGER,
    CHARACTER,
    FLOAT,
    DOUBLE,
    LONG,
    BOOLEAN,
    STRING,
    CLASS,
    ENUM,
    NESTED,
    ARRAY
}

const valuesEquivalence = Arr.getEquivalence(Equal.equivalence<AnnotationValue>());

/**
 * A member value of an annotation instance. Each value carries the member name it is bound to;
 * elements of an array value have an empty name.
 */
export abstract class AnnotationValue implements Equal.Equal {
    public abstract readonly kind: AnnotationValueKind;
    public readonly name: string;

    protected constructor(name: string) {
        this.name = name;
    }

    public static createByteValue(name: string, value: number): ByteValue {
        return new ByteValue(name, value);
    }

    public static createShortValue(name: string, value: number): ShortValue {
        return new ShortValue(name, value);
    }

    public static createIntegerValue(name: string, value: number): IntegerValue {
        return new IntegerValue(name, value);
    }

    public static createCharacterValue(name: string, value: string): CharacterValue {
        return new CharacterValue(name, value);
    }

    public static createFloatValue(name: string, value: number): FloatValue {
        return new FloatValue(name, value);
    }

    public static createDoubleValue(name: string, value: number): DoubleValue {
        return new DoubleValue(name, value);
    }

    public static createLongValue(name: string, value: bigint): LongValue {
        return new LongValue(name, value);
    }

    public static createBooleanValue(name: string, value: boolean): BooleanValue {
        return new BooleanValue(name, value);
    }

    public static createStringValue(name: string, value: string): StringValue {
        return new StringValue(name, value);
    }

    public static createClassValue(name: string, type: Type): ClassValue {
        return new ClassValue(name, type);
    }

    public static createEnumValue(name: string, typeName: string, constant: string): EnumValue {
        return new EnumValue(name, typeName, constant);
    }

    public static createNestedAnnotationValue(name: string, instance: AnnotationInstance): NestedAnnotationValue {
        return new NestedAnnotationValue(name, instance);
    }

    public static createArrayValue(name: string, values: readonly AnnotationValue[]): ArrayValue {
        return new ArrayValue(name, values);
    }

    public asInt(): number {
        throw new AnnotationValueKindError('Not a number');
    }

    public asLong(): bigint {
        throw new AnnotationValueKindError('Not a number');
    }

    public asDouble(): number {
        throw new AnnotationValueKindError('Not a number');
    }

    public asChar(): string {
        throw new AnnotationValueKindError('Not a character');
    }

    public asBoolean(): boolean {
        throw new AnnotationValueKindError('Not a boolean');
    }

    public asString(): string {
        throw new AnnotationValueKindError('Not a string');
    }

    public asClass(): Type {
        throw new AnnotationValueKindError('Not a class');
    }

    public asEnum(): string {
        throw new AnnotationValueKindError('Not an enum');
    }

    public asEnumType(): string {
        throw new AnnotationValueKindError('Not an enum');
    }

    public asNested(): AnnotationInstance {
        throw new AnnotationValueKindError('Not a nested annotation');
    }

    public asArray(): readonly AnnotationValue[] {
        throw new AnnotationValueKindError('Not an array');
    }

    public asNestedArray(): AnnotationInstance[] {
        throw new AnnotationValueKindError('Not a nested annotation array');
    }

    public asStringArray(): string[] {
        throw new AnnotationValueKindError('Not a string array');
    }

    public asClassArray(): Type[] {
        throw new AnnotationValueKindError('Not a class array');
    }

    public asEnumArray(): string[] {
        throw new AnnotationValueKindError('Not an enum array');
    }

    /** Source-like rendering of the bound value alone, without the member name. */
    public abstract valueString(): string;

    public toString(): string {
        if(this.name.length === 0)
            return this.valueString();
        return this.name + ' = ' + this.valueString();
    }

    protected abstract sameValue(that: AnnotationValue): boolean;

    protected abstract valueHash(): number;

    public [Equal.symbol](that: Equal.Equal): boolean {
        if(!(that instanceof AnnotationValue) || that.kind !== this.kind || that.name !== this.name)
            return false;
        return this.sameValue(that);
    }

    public [Hash.symbol](): number {
        return pipe(
            Hash.string(this.name),
            Hash.combine(Hash.number(this.kind)),
            Hash.combine(this.valueHash())
        );
    }
}

export abstract class NumericValue extends AnnotationValue {
    public readonly value: number;

    protected constructor(name: string, value: number) {
        super(name);
        this.value = value;
    }

    private static readonly INT_MIN = -2147483648;
    private static readonly INT_MAX = 2147483647;
    private static readonly LONG_MIN = -(2n ** 63n);
    private static readonly LONG_MAX = 2n ** 63n - 1n;

    // same saturation as the JVM's d2i/d2l: NaN becomes 0, out-of-range values clamp
    public asInt(): number {
        if(Number.isNaN(this.value))
            return 0;
        if(this.value >= NumericValue.INT_MAX)
            return NumericValue.INT_MAX;
        if(this.value <= NumericValue.INT_MIN)
            return NumericValue.INT_MIN;
        return Math.trunc(this.value);
    }

    public asLong(): bigint {
        if(Number.isNaN(this.value))
            return 0n;
        if(this.value >= 2 ** 63)
            return NumericValue.LONG_MAX;
        if(this.value <= -(2 ** 63))
            return NumericValue.LONG_MIN;
        return BigInt(Math.trunc(this.value));
    }

    public asDouble(): number {
        return this.value;
    }

    public valueString(): string {
        return String(this.value);
    }

    protected sameValue(that: AnnotationValue): boolean {
        return that instanceof NumericValue && Object.is(that.value, this.value);
    }

    protected valueHash(): number {
        return Hash.number(this.value);
    }
}

export class ByteValue extends NumericValue {
    public readonly kind = AnnotationValueKind.BYTE;

    public constructor(name: string, value: number) {
        super(name, value);
    }
}

export class ShortValue extends NumericValue {
    public readonly kind = AnnotationValueKind.SHORT;

    public constructor(name: string, value: number) {
        super(name, value);
    }
}

export class IntegerValue extends NumericValue {
    public readonly kind = AnnotationValueKind.INTEGER;

    public constructor(name: string, value: number) {
        super(name, value);
    }
}

export class FloatValue extends NumericValue {
    public readonly kind = AnnotationValueKind.FLOAT;

    public constructor(name: string, value: number) {
        super(name, Math.fround(value));
    }

    public valueString(): string {
        return String(this.value) + 'f';
    }
}

export class DoubleValue extends NumericValue {
    public readonly kind = AnnotationValueKind.DOUBLE;

    public constructor(name: string, value: number) {
        super(name, value);
    }
}

export class LongValue extends AnnotationValue {
    public readonly kind = AnnotationValueKind.LONG;
    public readonly value: bigint;

    public constructor(name: string, value: bigint) {
        super(name);
        this.value = value;
    }

    public asInt(): number {
        return Number(BigInt.asIntN(32, this.value));
    }

    public asLong(): bigint {
        return this.value;
    }

    public asDouble(): number {
        return Number(this.value);
    }

    public valueString(): string {
        return this.value.toString() + 'L';
    }

    protected sameValue(that: AnnotationValue): boolean {
        return that instanceof LongValue && that.value === this.value;
    }

    protected valueHash(): number {
        return Hash.hash(this.value);
    }
}

export class CharacterValue extends AnnotationValue {
    public readonly kind = AnnotationValueKind.CHARACTER;
    public readonly value: string;

    public constructor(name: string, value: string) {
        super(name);
        this.value = value;
    }

    public asChar(): string {
        return this.value;
    }

    public valueString(): string {
        return '\'' + this.value + '\'';
    }

    protected sameValue(that: AnnotationValue): boolean {
        return that instanceof CharacterValue && that.value === this.value;
    }

    protected valueHash(): number {
        return Hash.string(this.value);
    }
}

export class BooleanValue extends AnnotationValue {
    public readonly kind = AnnotationValueKind.BOOLEAN;
    public readonly value: boolean;

    public constructor(name: string, value: boolean) {
        super(name);
        this.value = value;
    }

    public asBoolean(): boolean {
        return this.value;
    }

    public valueString(): string {
        return String(this.value);
    }

    protected sameValue(that: AnnotationValue): boolean {
        return that instanceof BooleanValue && that.value === this.value;
    }

    protected valueHash(): number {
        return Hash.hash(this.value);
    }
}

export class StringValue extends AnnotationValue {
    public readonly kind = AnnotationValueKind.STRING;
    public readonly value: string;

    public constructor(name: string, value: string) {
        super(name);
        this.value = value;
    }

    public asString(): string {
        return this.value;
    }

    public valueString(): string {
        return JSON.stringify(this.value);
    }

    protected sameValue(that: AnnotationValue): boolean {
        return that instanceof StringValue && that.value === this.value;
    }

    protected valueHash(): number {
        return Hash.string(this.value);
    }
}

export class ClassValue extends AnnotationValue {
    public readonly kind = AnnotationValueKind.CLASS;
    public readonly value: Type;

    public constructor(name: string, value: Type) {
        super(name);
        this.value = value;
    }

    public asClass(): Type {
        return this.value;
    }

    public valueString(): string {
        return this.value.toString() + '.class';
    }

    protected sameValue(that: AnnotationValue): boolean {
        return that instanceof ClassValue && Equal.equals(that.value, this.value);
    }

    protected valueHash(): number {
        return Hash.hash(this.value);
    }
}

export class EnumValue extends AnnotationValue {
    public readonly kind = AnnotationValueKind.ENUM;
    public readonly typeName: string;
    public readonly constant: string;

    public constructor(name: string, typeName: string, constant: string) {
        super(name);
        this.typeName = typeName;
        this.constant = constant;
    }

    public asEnum(): string {
        return this.constant;
    }

    public asEnumType(): string {
        return this.typeName;
    }

    public valueString(): string {
        return DotNames.simpleName(this.typeName) + '.' + this.constant;
    }

    protected sameValue(that: AnnotationValue): boolean {
        return that instanceof EnumValue && that.typeName === this.typeName && that.constant === this.constant;
    }

    protected valueHash(): number {
        return pipe(Hash.string(this.typeName), Hash.combine(Hash.string(this.constant)));
    }
}

export class NestedAnnotationValue extends AnnotationValue {
    public readonly kind = AnnotationValueKind.NESTED;
    public readonly value: AnnotationInstance;

    public constructor(name: string, value: AnnotationInstance) {
        super(name);
        this.value = value;
    }

    public asNested(): AnnotationInstance {
        return this.value;
    }

    public valueString(): string {
        return this.value.toString();
    }

    protected sameValue(that: AnnotationValue): boolean {
        return that instanceof NestedAnnotationValue && Equal.equals(that.value, this.value);
    }

    protected valueHash(): number {
        return Hash.hash(this.value);
    }
}

export class ArrayValue extends AnnotationValue {
    public readonly kind = AnnotationValueKind.ARRAY;
    public readonly value: readonly AnnotationValue[];

    public constructor(name: string, value: readonly AnnotationValue[]) {
        super(name);
        this.value = Object.freeze([...value]);
    }

    public asArray(): readonly AnnotationValue[] {
        return this.value;
    }

    // an empty array narrows to every element kind; a mixed or mismatched one to none
    public asNestedArray(): AnnotationInstance[] {
        return this.value.map(element => {
            if(!(element instanceof NestedAnnotationValue))
                throw new AnnotationValueKindError('Not a nested annotation array');
            return element.value;
        });
    }

    public asStringArray(): string[] {
        return this.value.map(element => {
            if(!(element instanceof StringValue))
                throw new AnnotationValueKindError('Not a string array');
            return element.value;
        });
    }

    public asClassArray(): Type[] {
        return this.value.map(element => {
            if(!(element instanceof ClassValue))
                throw new AnnotationValueKindError('Not a class array');
            return element.value;
        });
    }

    public asEnumArray(): string[] {
        return this.value.map(element => {
            if(!(element instanceof EnumValue))
                throw new AnnotationValueKindError('Not an enum array');
            return element.constant;
        });
    }

    public valueString(): string {
        return '{' + this.value.map(element => element.valueString()).join(', ') + '}';
    }

    protected sameValue(that: AnnotationValue): boolean {
        return that instanceof ArrayValue && valuesEquivalence(that.value, this.value);
    }

    protected valueHash(): number {
        return Hash.array(this.value);
    }
}
