export type ObjectPrefixes = {
  retrieval: string;
  inputBatch: string;
  outputBatch: string;
  predicted: string;
};

export const defaultObjectPrefixes: ObjectPrefixes = {
  retrieval: "retrieved_from_db",
  inputBatch: "input_batch",
  outputBatch: "output_batch",
  predicted: "predicted_values_output"
};

const pad = (value: number) => String(value).padStart(2, "0");

/** `YYYYMMDD_HHMMSS` in UTC. */
export const formatRunTimestamp = (date: Date): string =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
  `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

const join = (prefix: string, name: string) => `${prefix.replace(/\/+$/, "")}/${name}`;

export const queryExportKey = (prefixes: ObjectPrefixes, timestamp: string) =>
  join(prefixes.retrieval, `query_results_${timestamp}.csv`);

export const inputBatchKey = (prefixes: ObjectPrefixes, batchId: string, timestamp: string) =>
  join(prefixes.inputBatch, `${batchId}_${timestamp}.csv`);

/** The prediction service writes `<input file name>.out` under the output prefix. */
export const outputBatchKey = (prefixes: ObjectPrefixes, inputKey: string) => {
  const fileName = inputKey.slice(inputKey.lastIndexOf("/") + 1);
  return join(prefixes.outputBatch, `${fileName}.out`);
};

export const predictedOutputKey = (prefixes: ObjectPrefixes, timestamp: string) =>
  join(prefixes.predicted, `output_results_${timestamp}.csv`);

export const toObjectUri = (bucket: string, keyOrPrefix: string) => `s3://${bucket}/${keyOrPrefix}`;
