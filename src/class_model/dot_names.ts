export class DotNames {
    public static readonly OBJECT = 'java.lang.Object';
    public static readonly ENUM = 'java.lang.Enum';
    public static readonly RECORD = 'java.lang.Record';
    public static readonly ANNOTATION = 'java.lang.annotation.Annotation';
    public static readonly REPEATABLE = 'java.lang.annotation.Repeatable';

    // member of @Repeatable naming the container, and member of the container holding the instances
    public static readonly VALUE_MEMBER = 'value';

    public static simpleName(binaryName: string): string {
        const lastDot = binaryName.lastIndexOf('.');
        const local = (lastDot >= 0) ? binaryName.substring(lastDot + 1) : binaryName;
        const lastDollar = local.lastIndexOf('$');
        return (lastDollar >= 0) ? local.substring(lastDollar + 1) : local;
    }
}
