// Outcome of a call to the Compiler Explorer service. Exactly one of the fields is set.
export type ApiResult<T> = { data?: T; error?: string };
