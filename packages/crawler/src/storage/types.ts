type PersistenceError = {
  kind: 'persistence-error';
  message: string;
  path: string;
};

type PersistSuccess = {
  ok: true;
  savedPath: string;
  absolutePath: string;
  byteLength: number;
};

type PersistFailure = {
  ok: false;
  error: PersistenceError;
};

type PersistOutcome = PersistSuccess | PersistFailure;

type ResultStoreOptions = {
  rootDir: string;
};

export type {
  PersistenceError,
  PersistFailure,
  PersistOutcome,
  PersistSuccess,
  ResultStoreOptions,
};
