import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3Client
} from "@aws-sdk/client-s3";
import { isMissingObjectError, S3ObjectStorage } from "../../src/infrastructure/s3/S3ObjectStorage";
import { ObjectNotFoundError } from "../../src/ports/ObjectStorage";

const namedError = (name: string) => Object.assign(new Error(name), { name });
const statusError = (httpStatusCode: number) =>
  Object.assign(new Error(`status ${httpStatusCode}`), { $metadata: { httpStatusCode } });

const storageWith = (send: jest.Mock) => new S3ObjectStorage({ send } as unknown as S3Client, "test-bucket");

describe("S3ObjectStorage", () => {
  it("reads an object body as text", async () => {
    const transformToString = jest.fn().mockResolvedValue("id,value\n1,65535");
    const send = jest.fn().mockResolvedValue({ Body: { transformToString } });

    await expect(storageWith(send).readObject("retrieved_from_db/a.csv")).resolves.toBe("id,value\n1,65535");

    const [command] = send.mock.calls[0] as [GetObjectCommand];
    expect(command).toBeInstanceOf(GetObjectCommand);
    expect(command.input).toEqual({ Bucket: "test-bucket", Key: "retrieved_from_db/a.csv" });
    expect(transformToString).toHaveBeenCalledWith("utf-8");
  });

  it.each([
    ["NoSuchKey", namedError("NoSuchKey")],
    ["a 404 status", statusError(404)],
    ["an empty body", undefined]
  ])("reports a missing object for %s", async (_label, error) => {
    const send = error ? jest.fn().mockRejectedValue(error) : jest.fn().mockResolvedValue({});

    await expect(storageWith(send).readObject("missing.csv")).rejects.toThrow(new ObjectNotFoundError("missing.csv"));
  });

  it("propagates other read failures", async () => {
    const send = jest.fn().mockRejectedValue(statusError(403));

    await expect(storageWith(send).readObject("a.csv")).rejects.toThrow("status 403");
  });

  it("writes csv by default", async () => {
    const send = jest.fn().mockResolvedValue({});

    await storageWith(send).writeObject("input_batch/b.csv", "1,2");

    const [command] = send.mock.calls[0] as [PutObjectCommand];
    expect(command).toBeInstanceOf(PutObjectCommand);
    expect(command.input).toEqual({
      Bucket: "test-bucket",
      Key: "input_batch/b.csv",
      Body: "1,2",
      ContentType: "text/csv"
    });
  });

  it("checks existence with a head request", async () => {
    const found = jest.fn().mockResolvedValue({});
    const missing = jest.fn().mockRejectedValue(namedError("NotFound"));
    const forbidden = jest.fn().mockRejectedValue(statusError(403));

    await expect(storageWith(found).objectExists("a")).resolves.toBe(true);
    await expect(storageWith(missing).objectExists("a")).resolves.toBe(false);
    await expect(storageWith(forbidden).objectExists("a")).rejects.toThrow("status 403");
    expect(found.mock.calls[0]?.[0]).toBeInstanceOf(HeadObjectCommand);
  });

  it("lists keys under a prefix", async () => {
    const send = jest.fn().mockResolvedValue({ Contents: [{ Key: "output_batch/a.out" }, {}, { Key: "output_batch/b.out" }] });

    await expect(storageWith(send).listObjects("output_batch", 10)).resolves.toEqual([
      "output_batch/a.out",
      "output_batch/b.out"
    ]);

    const [command] = send.mock.calls[0] as [ListObjectsV2Command];
    expect(command).toBeInstanceOf(ListObjectsV2Command);
    expect(command.input).toEqual({ Bucket: "test-bucket", Prefix: "output_batch", MaxKeys: 10 });
  });

  it("returns no keys for an empty listing", async () => {
    const send = jest.fn().mockResolvedValue({});

    await expect(storageWith(send).listObjects("output_batch")).resolves.toEqual([]);
  });
});

describe("isMissingObjectError", () => {
  it.each([
    [namedError("NoSuchKey"), true],
    [namedError("NotFound"), true],
    [statusError(404), true],
    [statusError(500), false],
    [new Error("boom"), false],
    ["NoSuchKey", false],
    [null, false]
  ])("classifies %p", (error, expected) => {
    expect(isMissingObjectError(error)).toBe(expected);
  });
});
