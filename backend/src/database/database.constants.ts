export const DATABASE_CONFIG = Symbol('DATABASE_CONFIG');
