export enum TypeQualifier {
    NONE = "none",
    REFERENCE = "reference",
    CONST = "const",
}
