import { parser } from '@lezer/rust';

export const rustParser = parser;
