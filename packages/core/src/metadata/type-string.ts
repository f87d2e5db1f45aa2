/**
 * Runtime type-string parsing
 *
 * Type references in universe manifests use the runtime display syntax:
 *
 * - "System.Int32"                                    named type
 * - "T"                                               generic parameter (resolved by scope)
 * - "System.Int32[]" / "System.Int32[,]"              arrays of rank 1 / 2
 * - "System.Int32&" / "System.Int32*"                 by-ref / pointer
 * - "System.Collections.Generic.List`1[[System.Int32]]"
 * - "System.Collections.Generic.Dictionary`2[[K],[V]]"
 *
 * Parsing is purely syntactic; names are resolved when the manifest is
 * linked.
 */

export type TypeSyntax =
  | {
      readonly kind: "named";
      readonly name: string;
      readonly typeArguments: readonly TypeSyntax[];
    }
  | {
      readonly kind: "array";
      readonly elementType: TypeSyntax;
      readonly rank: number;
    }
  | { readonly kind: "byRef"; readonly elementType: TypeSyntax }
  | { readonly kind: "pointer"; readonly elementType: TypeSyntax };

/**
 * Index of the '[' matching the ']' at `close`, or -1.
 */
const matchingOpen = (text: string, close: number): number => {
  let depth = 0;
  for (let i = close; i >= 0; i--) {
    const char = text[i];
    if (char === "]") depth++;
    if (char === "[") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
};

/**
 * Split type arguments handling nested brackets.
 */
const splitTypeArguments = (str: string): string[] => {
  const result: string[] = [];
  let depth = 0;
  let current = "";

  for (const char of str) {
    if (char === "[") {
      depth++;
      current += char;
    } else if (char === "]") {
      depth--;
      current += char;
    } else if (char === "," && depth === 0) {
      result.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  if (current.trim()) {
    result.push(current.trim());
  }

  return result;
};

const unbracket = (arg: string): string =>
  arg.startsWith("[") && arg.endsWith("]") ? arg.slice(1, -1).trim() : arg;

const isName = (text: string): boolean => /^[^[\]&*,\s][^[\]&*,]*$/.test(text);

/**
 * Parse a runtime type string. Undefined when the text is malformed.
 */
export const parseTypeString = (text: string): TypeSyntax | undefined => {
  const typeString = text.trim();
  if (typeString.length === 0) return undefined;

  if (typeString.endsWith("&")) {
    const elementType = parseTypeString(typeString.slice(0, -1));
    return elementType ? { kind: "byRef", elementType } : undefined;
  }

  if (typeString.endsWith("*")) {
    const elementType = parseTypeString(typeString.slice(0, -1));
    return elementType ? { kind: "pointer", elementType } : undefined;
  }

  if (!typeString.endsWith("]")) {
    return isName(typeString)
      ? { kind: "named", name: typeString, typeArguments: [] }
      : undefined;
  }

  const open = matchingOpen(typeString, typeString.length - 1);
  if (open <= 0) return undefined;
  const head = typeString.slice(0, open);
  const inner = typeString.slice(open + 1, -1);

  // Array suffix: "[]", "[,]", "[,,]" ...
  if (/^,*$/.test(inner)) {
    const elementType = parseTypeString(head);
    return elementType
      ? { kind: "array", elementType, rank: inner.length + 1 }
      : undefined;
  }

  if (!isName(head)) return undefined;
  const typeArguments: TypeSyntax[] = [];
  for (const arg of splitTypeArguments(inner)) {
    const parsed = parseTypeString(unbracket(arg));
    if (!parsed) return undefined;
    typeArguments.push(parsed);
  }
  return { kind: "named", name: head, typeArguments };
};

/**
 * Generic arity encoded in a definition name ("List`1" → 1).
 */
export const arityOf = (fullName: string): number => {
  const match = fullName.match(/`(\d+)$/);
  return match?.[1] ? parseInt(match[1], 10) : 0;
};
