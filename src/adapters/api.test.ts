import axios, { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from "axios";
import { describe, expect, it, vi } from "vitest";

import { InvalidSnapshotError } from "../errors";
import { Logger } from "../logger";
import { ApiPermissionsStore } from "./api";

const URL = "https://permissions.example.test/snapshot";

function stubAdapter(status: number, data: unknown, requests: InternalAxiosRequestConfig[] = []) {
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        response
      );
    }
    return response;
  };
  return axios.create({ adapter });
}

const quietLogger = (): Logger => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe("ApiPermissionsStore", () => {
  it("loads the snapshot the API returns", async () => {
    const client = stubAdapter(200, { users: { u: { permissions: ["a"] } } });
    const store = new ApiPermissionsStore(URL, { client });

    await expect(store.load()).resolves.toEqual({ users: { u: { permissions: ["a"] } } });
  });

  it("loads nothing when the API has no snapshot", async () => {
    const logger = quietLogger();
    const store = new ApiPermissionsStore(URL, { client: stubAdapter(404, ""), logger });

    await expect(store.load()).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(`No permissions found at ${URL}`);
  });

  it("passes other failures on", async () => {
    const store = new ApiPermissionsStore(URL, { client: stubAdapter(500, "") });

    await expect(store.load()).rejects.toThrow("Request failed with status code 500");
  });

  it("rejects a body that isn't a snapshot", async () => {
    const store = new ApiPermissionsStore(URL, { client: stubAdapter(200, ["a"]) });

    await expect(store.load()).rejects.toThrow(InvalidSnapshotError);
  });

  it("saves with a PUT", async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const store = new ApiPermissionsStore(URL, { client: stubAdapter(204, "", requests) });
    const snapshot = { groups: { editors: { permissions: ["articles"] } } };

    await store.save(snapshot);

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe("put");
    expect(requests[0].url).toBe(URL);
    expect(JSON.parse(String(requests[0].data))).toEqual(snapshot);
  });
});
