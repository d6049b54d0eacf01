import { z } from 'zod';
import RAW_PACKAGE_JSON from '../package.json';

const PACKAGE_JSON_SCHEMA = z.object({
  name: z.string(),
  version: z.string(),
});

const PKG = PACKAGE_JSON_SCHEMA.parse(RAW_PACKAGE_JSON);

export const PACKAGE_NAME = PKG.name;
export const VERSION = PKG.version;
