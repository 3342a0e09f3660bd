/**
 * Operations over persistent singly linked lists.
 *
 * Every function here is pure: inputs are never mutated, and results share
 * structure with their inputs wherever the operation allows it. Traversals
 * are loops rather than recursion, so none of them grows the call stack with
 * the length of the list. Right folds buffer the spine in an array and
 * combine from the end.
 *
 * @module
 */
import { cons, type List, nil } from "../../cons.ts";
import { EmptyListError } from "./emptyListError.ts";

export type { ConsCell, List, Nil } from "../../cons.ts";

/** Builds a list holding the given values in order. */
export const fromArray = <T>(values: readonly T[]): List<T> => {
  let result: List<T> = nil;
  for (let i = values.length - 1; i >= 0; i--) {
    result = cons(values[i], result);
  }
  return result;
};

/** Variadic form of {@link fromArray}. */
export const list = <T>(...values: T[]): List<T> => fromArray(values);

export const toArray = <T>(l: List<T>): T[] => {
  const values: T[] = [];
  let current = l;
  while (current.kind === "cons") {
    values.push(current.head);
    current = current.tail;
  }
  return values;
};

/**
 * Accumulates from the first element to the last.
 *
 * @param l the list to reduce.
 * @param z the initial accumulator.
 * @param f combines the accumulator with the next element.
 */
export const foldLeft = <T, B>(
  l: List<T>,
  z: B,
  f: (acc: B, value: T) => B,
): B => {
  let acc = z;
  let current = l;
  while (current.kind === "cons") {
    acc = f(acc, current.head);
    current = current.tail;
  }
  return acc;
};

/**
 * Right-associative fold: `f(x1, f(x2, ... f(xn, z)))`.
 * `f` is applied to the last element first.
 */
export const foldRight = <T, B>(
  l: List<T>,
  z: B,
  f: (value: T, acc: B) => B,
): B => toArray(l).reduceRight((acc: B, value: T) => f(value, acc), z);

export const sum = (l: List<number>): number =>
  foldLeft(l, 0, (acc, value) => acc + value);

export const sumViaFoldRight = (l: List<number>): number =>
  foldRight(l, 0, (value, acc) => value + acc);

/**
 * Multiplies the elements together, stopping at the first zero: elements
 * after it are never read.
 */
export const product = (l: List<number>): number => {
  const prefix: number[] = [];
  let current = l;
  while (current.kind === "cons") {
    if (current.head === 0) {
      return prefix.reduceRight((acc, value) => value * acc, 0);
    }
    prefix.push(current.head);
    current = current.tail;
  }
  return prefix.reduceRight((acc, value) => value * acc, 1);
};

export const productViaFoldRight = (l: List<number>): number =>
  foldRight(l, 1, (value, acc) => value * acc);

/**
 * @returns the elements of `a` followed by those of `b`. `b` is shared, not
 * copied, so `append(nil, b)` is `b` itself.
 */
export const append = <T>(a: List<T>, b: List<T>): List<T> => {
  const prefix = toArray(a);
  let result = b;
  for (let i = prefix.length - 1; i >= 0; i--) {
    result = cons(prefix[i], result);
  }
  return result;
};

export const appendViaFoldRight = <T>(a: List<T>, b: List<T>): List<T> =>
  foldRight<T, List<T>>(a, b, (value, acc) => cons(value, acc));

export const appendViaFoldLeft = <T>(a: List<T>, b: List<T>): List<T> =>
  foldLeft<T, List<T>>(reverse(a), b, (acc, value) => cons(value, acc));

export const length = <T>(l: List<T>): number =>
  foldRight(l, 0, (_value, acc) => acc + 1);

export const lengthViaFoldLeft = <T>(l: List<T>): number =>
  foldLeft(l, 0, (acc, _value) => acc + 1);

export const reverse = <T>(l: List<T>): List<T> =>
  foldLeft<T, List<T>>(l, nil, (acc, value) => cons(value, acc));

/**
 * @returns everything after the head.
 * @throws {EmptyListError} if the list is empty.
 */
export const tail = <T>(l: List<T>): List<T> => {
  if (l.kind === "nil") {
    throw new EmptyListError("Can't take tail of empty list");
  }
  return l.tail;
};

/**
 * Replaces the head of a list. Unlike {@link tail}, the empty list is
 * accepted and yields a single element list.
 */
export const setHead = <T>(l: List<T>, h: T): List<T> =>
  l.kind === "nil" ? cons(h, nil) : cons(h, l.tail);

/**
 * Removes the first `n` elements. Dropping more elements than the list has
 * gives the empty list, and so does any negative count, since the countdown
 * never reaches zero before the list runs out.
 */
export const drop = <T>(l: List<T>, n: number): List<T> => {
  let remaining = n;
  let current = l;
  while (remaining !== 0 && current.kind === "cons") {
    current = current.tail;
    remaining--;
  }
  return current;
};

/** Removes the longest prefix whose elements all satisfy `predicate`. */
export const dropWhile = <T>(
  l: List<T>,
  predicate: (value: T) => boolean,
): List<T> => {
  let current = l;
  while (current.kind === "cons" && predicate(current.head)) {
    current = current.tail;
  }
  return current;
};

/** All elements but the last; empty for lists of length zero or one. */
export const init = <T>(l: List<T>): List<T> =>
  fromArray(toArray(l).slice(0, -1));

export const map = <T, U>(l: List<T>, f: (value: T) => U): List<U> =>
  foldRight<T, List<U>>(l, nil, (value, acc) => cons(f(value), acc));

export const filter = <T>(
  l: List<T>,
  predicate: (value: T) => boolean,
): List<T> =>
  foldRight<T, List<T>>(
    l,
    nil,
    (value, acc) => predicate(value) ? cons(value, acc) : acc,
  );

export const flatMap = <T, U>(
  l: List<T>,
  f: (value: T) => List<U>,
): List<U> =>
  foldRight<T, List<U>>(l, nil, (value, acc) => append(f(value), acc));

export const filterViaFlatMap = <T>(
  l: List<T>,
  predicate: (value: T) => boolean,
): List<T> =>
  flatMap<T, T>(l, (value) => predicate(value) ? cons(value, nil) : nil);

/**
 * Combines the two lists element by element. The result is as long as the
 * shorter input; the surplus of the longer one is ignored.
 */
export const zipWith = <A, B, C>(
  a: List<A>,
  b: List<B>,
  f: (lft: A, rgt: B) => C,
): List<C> => {
  const combined: C[] = [];
  let lft = a;
  let rgt = b;
  while (lft.kind === "cons" && rgt.kind === "cons") {
    combined.push(f(lft.head, rgt.head));
    lft = lft.tail;
    rgt = rgt.tail;
  }
  return fromArray(combined);
};

export const addElements = (
  a: List<number>,
  b: List<number>,
): List<number> => zipWith(a, b, (lft, rgt) => lft + rgt);

/**
 * Compare two lists element by element.
 *
 * @param eq element equality, strict equality unless given.
 */
export const equivalent = <T>(
  a: List<T>,
  b: List<T>,
  eq: (lft: T, rgt: T) => boolean = (lft, rgt) => lft === rgt,
): boolean => {
  let lft = a;
  let rgt = b;
  while (lft.kind === "cons" && rgt.kind === "cons") {
    if (!eq(lft.head, rgt.head)) {
      return false;
    }
    lft = lft.tail;
    rgt = rgt.tail;
  }
  return lft.kind === rgt.kind;
};

/** Renders a list as nested constructors, e.g. `Cons(1, Cons(2, Nil))`. */
export const prettyPrint = <T>(l: List<T>): string => {
  const values = toArray(l);
  return values.map((value) => `Cons(${String(value)}, `).join("") + "Nil" +
    ")".repeat(values.length);
};
