// CHANGE: Configuration and command line option types for the check runner
// PURITY: CORE
// COMPLEXITY: O(1) - type declarations only

import type { SourceGroup } from "../models.js";

/**
 * Минимальный уровень диагностического логирования.
 */
export type LogLevelName = "debug" | "info" | "warning" | "error" | "none";

/**
 * Описание внешнего инструмента из linegate.config.json.
 *
 * @property name Имя проверки, под которым она вызывается из CLI
 * @property program Исполняемый файл инструмента
 * @property args Аргументы, добавляемые перед списком файлов
 * @property extensions Расширения файлов для проверки; null: все файлы
 * @property lineFilterFlag Флаг, за которым передаётся JSON фильтра строк
 * @property fixFlag Флаг исправления на месте; null: инструмент не умеет исправлять
 * @property warningsAsErrorsFlag Флаг, превращающий предупреждения в ошибки
 * @property warningsAsErrors Передавать ли warningsAsErrorsFlag
 * @property diffScoped Ограничивать ли диагностику изменёнными строками
 * @property contextLines Количество строк контекста для git diff
 */
export interface ToolConfig {
	readonly name: string;
	readonly program: string;
	readonly args: readonly string[];
	readonly extensions: readonly string[] | null;
	readonly lineFilterFlag: string | null;
	readonly fixFlag: string | null;
	readonly warningsAsErrorsFlag: string | null;
	readonly warningsAsErrors: boolean;
	readonly diffScoped: boolean;
	readonly contextLines: number;
}

/**
 * Конфигурация linegate.config.json.
 */
export interface LinegateConfig {
	readonly tools: readonly ToolConfig[];
}

/**
 * Опции командной строки.
 *
 * @property checkName Имя проверки (первый позиционный аргумент)
 * @property files Явно переданные файлы
 * @property sourceGroup Группа исходников для выбора файлов
 * @property base Базовая ревизия для группы `modified` и diff-проверок
 * @property staged Проверять ли состояние индекса; null: по умолчанию от группы
 * @property jobs Количество параллельных задач; null: по числу CPU
 * @property verbose Печатать stdout/stderr упавших проверок
 * @property fix Применять исправления вместо проверки
 * @property showProgress Показывать индикатор прогресса
 * @property configPath Путь к конфигурации; null: linegate.config.json в корне
 * @property logLevel Уровень диагностического логирования
 * @property help Показать справку
 */
export interface CLIOptions {
	readonly checkName: string | null;
	readonly files: readonly string[];
	readonly sourceGroup: SourceGroup;
	readonly base: string | null;
	readonly staged: boolean | null;
	readonly jobs: number | null;
	readonly verbose: boolean;
	readonly fix: boolean;
	readonly showProgress: boolean;
	readonly configPath: string | null;
	readonly logLevel: LogLevelName;
	readonly help: boolean;
}
