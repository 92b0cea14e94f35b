import { parser } from '@lezer/json';

export const jsonParser = parser;
