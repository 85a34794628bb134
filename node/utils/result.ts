export type Success<T> = {
  status: "ok";
  value: T;
};

export type ResultError<E> = {
  status: "error";
  error: string;
} & E;

// eslint-disable-next-line @typescript-eslint/no-empty-object-type
export type Result<T, E = {}> = Success<T> | ResultError<E>;

export function ok<T>(value: T): Success<T> {
  return { status: "ok", value };
}

export function fail<E extends object>(
  error: string,
  props: E,
): ResultError<E> {
  return { ...props, status: "error", error };
}
