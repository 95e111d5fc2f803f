/**
 * Smart Todo - task query, scoring and suggestion engine.
 */

// Types
export { ExitCode, getExitCodeName } from './types/exit-codes.js';
export type {
  Task, TaskPriority, TaskStore, NewTaskInput, TaskEdit, TaskChange,
} from './types/task.js';
export { TASK_PRIORITIES, PRIORITY_WEIGHT } from './types/task.js';
export type { TodoConfig, SuggestionConfig, OutputFormat } from './types/config.js';

// Core
export { TodoError } from './core/errors.js';
export { formatSuccess, formatError } from './core/output.js';
export { loadConfig, getConfigValue, setConfigValue, getDefaultConfig } from './core/config.js';
export { getLogger } from './core/logger.js';

// Tasks
export { addTask, addTasks } from './core/tasks/add.js';
export { setCompletion, setCompletionMany, parseSelection } from './core/tasks/complete.js';
export { updateTask } from './core/tasks/update.js';
export { deleteTask, deleteTasks } from './core/tasks/delete.js';
export { findTaskById, findTaskByIdOrName, findTasksByName } from './core/tasks/find.js';
export { validateDueDate, normalizePriority, validateDescription } from './core/tasks/validate.js';

// Query
export {
  parseDueDate, isOverdue, isDueToday, isDueSoon, isUpcoming, isAncient,
} from './core/query/dates.js';
export { filterTasks, sortTasks, resolveTimeFilter } from './core/query/filter.js';
export type { FilterOptions, TimeFilter } from './core/query/filter.js';
export {
  computeInsights, computeStatistics, quickInsights, completedTodayCount,
} from './core/query/insights.js';

// Suggestions
export { buildSmartView, buildRecommendations } from './core/suggest/smart-view.js';
export {
  analyzeTasks, calculateHealthScore, markSuggestions, postCompletionSuggestions, suggestFocus,
} from './core/suggest/health.js';
export { similarityScore, descriptionSimilarity, fuzzyFindTasks } from './core/suggest/similarity.js';
export {
  buildCleanupSuggestions, boostSuggestions, summarizeSuggestions, groupForBatch,
  specificSuggestions, findDuplicateTasks, findLowImpactTasks, findVagueTasks,
} from './core/suggest/cleanup.js';
export type { CleanupSuggestion, CleanupSummary, BatchGroup } from './core/suggest/cleanup.js';

// Store
export { loadTaskStore, saveTaskStore } from './store/task-store.js';
