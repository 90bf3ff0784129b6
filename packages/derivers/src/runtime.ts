/**
 * Runtime library imported by generated JSON code
 */

export type Json =
  | null
  | boolean
  | number
  | string
  | readonly Json[]
  | { readonly [key: string]: Json };

export type Option<A> = A | null;

/**
 * Raised by generated decoders for input that does not match the type.
 */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

export const decodeError = (message: string): never => {
  throw new DecodeError(message);
};

const isJsonArray = (x: Json): x is readonly Json[] => Array.isArray(x);

const isJsonObject = (x: Json): x is { readonly [key: string]: Json } =>
  typeof x === "object" && x !== null && !isJsonArray(x);

export const jsonField = (x: Json, key: string): Json => {
  if (!isJsonObject(x)) {
    return decodeError(`expected an object with field "${key}"`);
  }
  const value = x[key];
  return value === undefined ? decodeError(`missing field "${key}"`) : value;
};

/**
 * Element `index` of an array that must have exactly `length` elements
 */
export const jsonElement = (x: Json, length: number, index: number): Json => {
  if (!isJsonArray(x) || x.length !== length) {
    return decodeError(`expected an array of length ${length}`);
  }
  const value = x[index];
  return value === undefined
    ? decodeError(`missing array element ${index}`)
    : value;
};

/**
 * Tag of an encoded sum case: the string itself, or the leading string of
 * an array.
 */
export const jsonTag = (x: Json): string | undefined => {
  if (typeof x === "string") {
    return x;
  }
  if (isJsonArray(x)) {
    const [head] = x;
    return typeof head === "string" ? head : undefined;
  }
  return undefined;
};

export type Encoded_number = number;
export type Encoded_string = string;
export type Encoded_boolean = boolean;
export type Encoded_null = null;
/** Decimal digits, since JSON numbers lose precision past 2^53 */
export type Encoded_bigint = string;
export type Encoded_undefined = null;
export type Encoded_Array<A> = A[];
export type Encoded_Option<A> = A | null;

export const toJson_number = (x: number): Json => x;
export const toJson_string = (x: string): Json => x;
export const toJson_boolean = (x: boolean): Json => x;
export const toJson_null = (x: null): Json => x;
export const toJson_bigint = (x: bigint): Json => x.toString();
export const toJson_undefined = (_x: undefined): Json => null;

export const toJson_Array =
  <A>(toJson_A: (x: A) => Json) =>
  (x: readonly A[]): Json =>
    x.map((e) => toJson_A(e));

export const toJson_Option =
  <A>(toJson_A: (x: A) => Json) =>
  (x: Option<A>): Json =>
    x === null ? null : toJson_A(x);

export const ofJson_number = (x: Json): number =>
  typeof x === "number" ? x : decodeError("expected a number");

export const ofJson_string = (x: Json): string =>
  typeof x === "string" ? x : decodeError("expected a string");

export const ofJson_boolean = (x: Json): boolean =>
  typeof x === "boolean" ? x : decodeError("expected a boolean");

export const ofJson_null = (x: Json): null =>
  x === null ? null : decodeError("expected null");

export const ofJson_bigint = (x: Json): bigint =>
  typeof x === "string" && /^-?\d+$/.test(x)
    ? BigInt(x)
    : decodeError("expected a decimal integer string");

export const ofJson_undefined = (x: Json): undefined =>
  x === null ? undefined : decodeError("expected null");

export const ofJson_Array =
  <A>(ofJson_A: (x: Json) => A) =>
  (x: Json): A[] =>
    isJsonArray(x) ? x.map((e) => ofJson_A(e)) : decodeError("expected an array");

export const ofJson_Option =
  <A>(ofJson_A: (x: Json) => A) =>
  (x: Json): Option<A> =>
    x === null ? null : ofJson_A(x);

export const example_number = 0;
export const example_string = "";
export const example_boolean = false;
export const example_null = null;
export const example_bigint = 0n;
export const example_undefined = undefined;

export const example_Array = <A>(example_A: A): A[] => [example_A];

export const example_Option = <A>(_example_A: A): Option<A> => null;
