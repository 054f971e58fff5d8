/**
 * CHANGE: Централизованные ре-экспорты Node built-ins для SHELL-слоя
 * WHY: Единая точка импорта child_process/fs/path/os для процессов, git и чтения исходников
 *
 * Инвариант: экспортируем совместимые объекты/функции, избегая `export *` для модулей с `export =`.
 */
import * as fsNS from "node:fs";
import * as osNS from "node:os";
import * as pathNS from "node:path";

export { execFile } from "node:child_process";
export { promisify } from "node:util";

// node:path (и часто node:fs) используют `export =`, что несовместимо с `export *`
export const fs = fsNS;
export const os = osNS;
export const path = pathNS;
