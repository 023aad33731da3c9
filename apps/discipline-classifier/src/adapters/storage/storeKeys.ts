/**
 * @fileoverview Store key validation shared by the local stores
 *
 * @module adapters/storage/storeKeys
 */

import { join } from "path";
import { InvalidInputError } from "@papertriage/engine";

/**
 * Path of `<dir>/<id><extension>`.
 *
 * @throws InvalidInputError when the id could escape `dir`
 */
export function storePath(dir: string, id: string, extension: string): string {
    if (id.length === 0 || id.includes("/") || id.includes("\\") || id.includes("..") || id.includes("\0")) {
        throw new InvalidInputError(`Invalid identifier: ${JSON.stringify(id)}`, { details: { id } });
    }
    return join(dir, `${id}${extension}`);
}
