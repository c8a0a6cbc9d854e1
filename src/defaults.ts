/**
 * Step size used to walk the candidate queue when no jump is configured.
 */
export const DEFAULT_JUMP = 3;

/**
 * Cap applied by the input builder when no combinatorial limit is given.
 */
export const DEFAULT_COMBINATORIAL_LIMIT = 99;
