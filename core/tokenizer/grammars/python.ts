import { parser } from '@lezer/python';

export const pythonParser = parser;
