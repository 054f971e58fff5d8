// CHANGE: Load external tool declarations from linegate.config.json
// WHY: Tools are data; the engine treats each one as an opaque pass/fail producer
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<LinegateConfig, ConfigError>
// INVARIANT: Invalid tool entries are skipped; an unreadable or malformed file is a ConfigError
// COMPLEXITY: O(n) where n = number of tool entries

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { LinegateConfig, ToolConfig } from "../../core/types/index.js";
import { fs, path } from "../utils/node-mods.js";

export const DEFAULT_CONFIG_FILE = "linegate.config.json";

const DEFAULT_CONTEXT_LINES = 0;

type JSONObject = { readonly [key: string]: unknown };

/**
 * Type guard to check if value is a JSON object.
 */
function isJSONObject(value: unknown): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: unknown): value is readonly string[] {
	return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Читает необязательное строковое поле.
 *
 * @returns Строка, null при отсутствии поля, undefined при неверном типе
 */
function optionalString(
	entry: JSONObject,
	key: string,
): string | null | undefined {
	const value = entry[key];
	if (value === undefined || value === null) return null;
	return typeof value === "string" && value.length > 0 ? value : undefined;
}

function optionalBoolean(
	entry: JSONObject,
	key: string,
	fallback: boolean,
): boolean | undefined {
	const value = entry[key];
	if (value === undefined) return fallback;
	return typeof value === "boolean" ? value : undefined;
}

/**
 * Валидирует и нормализует описание инструмента.
 *
 * @param value Значение из массива `tools`
 * @returns Нормализованный инструмент или null, если запись некорректна
 *
 * @invariant name и program: непустые строки
 */
export function validateToolEntry(value: unknown): ToolConfig | null {
	if (!isJSONObject(value)) return null;
	const { name, program } = value;
	if (typeof name !== "string" || name.length === 0) return null;
	if (typeof program !== "string" || program.length === 0) return null;

	const args = value["args"] ?? [];
	if (!isStringArray(args)) return null;

	const extensionsRaw = value["extensions"] ?? null;
	if (extensionsRaw !== null && !isStringArray(extensionsRaw)) return null;

	const lineFilterFlag = optionalString(value, "lineFilterFlag");
	const fixFlag = optionalString(value, "fixFlag");
	const warningsAsErrorsFlag = optionalString(value, "warningsAsErrorsFlag");
	if (
		lineFilterFlag === undefined ||
		fixFlag === undefined ||
		warningsAsErrorsFlag === undefined
	) {
		return null;
	}

	const warningsAsErrors = optionalBoolean(
		value,
		"warningsAsErrors",
		warningsAsErrorsFlag !== null,
	);
	const diffScoped = optionalBoolean(value, "diffScoped", false);
	if (warningsAsErrors === undefined || diffScoped === undefined) return null;

	const contextLines = value["contextLines"] ?? DEFAULT_CONTEXT_LINES;
	if (
		typeof contextLines !== "number" ||
		!Number.isInteger(contextLines) ||
		contextLines < 0
	) {
		return null;
	}

	return {
		name,
		program,
		args: [...args],
		extensions: extensionsRaw === null ? null : [...extensionsRaw],
		lineFilterFlag,
		fixFlag,
		warningsAsErrorsFlag,
		warningsAsErrors,
		diffScoped,
		contextLines,
	};
}

/**
 * Разбирает содержимое конфигурации.
 *
 * @param raw Текст файла
 * @param configPath Путь для сообщений об ошибках
 */
export function parseLinegateConfig(
	raw: string,
	configPath: string,
): Effect.Effect<LinegateConfig, ConfigError> {
	return Effect.gen(function* () {
		const parsed: unknown = yield* Effect.try({
			try: (): unknown => JSON.parse(raw),
			catch: (error) =>
				new ConfigError({
					path: configPath,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		if (!isJSONObject(parsed)) {
			return yield* Effect.fail(
				new ConfigError({ path: configPath, detail: "expected a JSON object" }),
			);
		}
		const declared = parsed["tools"] ?? [];
		if (!Array.isArray(declared)) {
			return yield* Effect.fail(
				new ConfigError({ path: configPath, detail: "'tools' must be an array" }),
			);
		}

		const entries: readonly unknown[] = declared;
		const tools: ToolConfig[] = [];
		for (const [index, entry] of entries.entries()) {
			const tool = validateToolEntry(entry);
			if (tool === null) {
				yield* Effect.logWarning(
					`${configPath}: skipping invalid tool entry #${index}`,
				);
				continue;
			}
			tools.push(tool);
		}
		return { tools };
	});
}

/**
 * Загружает конфигурацию linegate.
 *
 * @param configPath Явный путь (`--config`); null: linegate.config.json в корне репозитория
 * @param root Корень репозитория
 * @returns Конфигурация; отсутствие файла по умолчанию: пустой список инструментов
 *
 * @effect Effect<LinegateConfig, ConfigError>
 */
export function loadLinegateConfig(
	configPath: string | null,
	root: string,
): Effect.Effect<LinegateConfig, ConfigError> {
	const resolved =
		configPath === null
			? path.join(root, DEFAULT_CONFIG_FILE)
			: path.resolve(configPath);
	return Effect.gen(function* () {
		if (configPath === null && !fs.existsSync(resolved)) {
			yield* Effect.logDebug(`no ${DEFAULT_CONFIG_FILE} in ${root}`);
			return { tools: [] };
		}
		const raw = yield* Effect.tryPromise({
			try: () => fs.promises.readFile(resolved, "utf8"),
			catch: (error) =>
				new ConfigError({
					path: resolved,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		return yield* parseLinegateConfig(raw, resolved);
	});
}
