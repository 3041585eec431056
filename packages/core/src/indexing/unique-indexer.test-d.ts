/**
 * Type tests for the indexing module
 */

import { expectTypeOf } from 'expect-type';
import { IndexedFixedArrays, UniqueIndexBuilder } from './unique-indexer';
import { FixedArray } from '../fixed-array/fixed-array';
import { uint8 } from '../dtype/constants';
import type { Uint8 } from '../dtype/types';

const red = FixedArray.fromArray(uint8, [255, 0, 0]);
const indexed = IndexedFixedArrays.fromSequence([red, red]);

expectTypeOf(indexed).toEqualTypeOf<IndexedFixedArrays<Uint8, 3>>();
expectTypeOf(indexed.values).toEqualTypeOf<FixedArray<Uint8, 3>[]>();
expectTypeOf(indexed.indices).toEqualTypeOf<readonly number[]>();
expectTypeOf(indexed.at(0)).toEqualTypeOf<FixedArray<Uint8, 3>>();
expectTypeOf(indexed.indexBuffer()).toEqualTypeOf<Uint16Array | Uint32Array>();
expectTypeOf(indexed.valueBuffer()).toEqualTypeOf<InstanceType<Uint8ArrayConstructor> | undefined>();

const builder = new UniqueIndexBuilder<Uint8, 3>();
expectTypeOf(builder.insert(red)).toEqualTypeOf<boolean>();
expectTypeOf(builder.build()).toEqualTypeOf<IndexedFixedArrays<Uint8, 3>>();

// @ts-expect-error - the builder only takes values of its length
builder.insert(FixedArray.fromArray(uint8, [1, 2]));
