import { expectTypeOf } from 'expect-type';
import type {
  IsInteger,
  IsNegative,
  IsNonNegativeInteger,
  ValidIndex,
} from './arithmetic';

expectTypeOf<IsInteger<4>>().toEqualTypeOf<true>();
expectTypeOf<IsInteger<4.5>>().toEqualTypeOf<false>();
expectTypeOf<IsInteger<-3>>().toEqualTypeOf<true>();

expectTypeOf<IsNegative<-1>>().toEqualTypeOf<true>();
expectTypeOf<IsNegative<0>>().toEqualTypeOf<false>();
expectTypeOf<IsNegative<7>>().toEqualTypeOf<false>();

expectTypeOf<IsNonNegativeInteger<0>>().toEqualTypeOf<true>();
expectTypeOf<IsNonNegativeInteger<2>>().toEqualTypeOf<true>();
expectTypeOf<IsNonNegativeInteger<-2>>().toEqualTypeOf<false>();
expectTypeOf<IsNonNegativeInteger<1.5>>().toEqualTypeOf<false>();

// Literal index against literal length
expectTypeOf<ValidIndex<0, 3>>().toEqualTypeOf<0>();
expectTypeOf<ValidIndex<2, 3>>().toEqualTypeOf<2>();
expectTypeOf<ValidIndex<3, 3>>().toEqualTypeOf<never>();
expectTypeOf<ValidIndex<10, 3>>().toEqualTypeOf<never>();
expectTypeOf<ValidIndex<-1, 3>>().toEqualTypeOf<never>();
expectTypeOf<ValidIndex<0.5, 3>>().toEqualTypeOf<never>();

// Dynamic values defer to the runtime check
expectTypeOf<ValidIndex<number, 3>>().toEqualTypeOf<number>();
expectTypeOf<ValidIndex<5, number>>().toEqualTypeOf<5>();
expectTypeOf<ValidIndex<-5, number>>().toEqualTypeOf<never>();
