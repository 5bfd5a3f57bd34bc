export * from './types';
export {
  AffineTransformer,
  affineTransformer,
  pairReferencePoints,
  roundHalfAwayFromZero,
} from './AffineTransformer';
