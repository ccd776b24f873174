export const RANDOM_BYTES_SOURCE = Symbol('RANDOM_BYTES_SOURCE');
