import axios, { AxiosInstance, isAxiosError } from "axios";
import { Logger, consoleLogger } from "../logger";
import { PermissionsSnapshot, validateSnapshot } from "../snapshot";
import { PermissionsStore } from "./PermissionsStore";

export interface ApiPermissionsStoreOptions {
  client?: AxiosInstance;
  logger?: Logger;
}

/**
 * Loads permissions with a GET and saves them with a PUT to the same URL.
 *
 * @example
 * ```ts
 * const store = new ApiPermissionsStore('https://example.com/permissions.json');
 * await synchronizedRegistry.load(store);
 * ```
 */
export class ApiPermissionsStore implements PermissionsStore {
  private client: AxiosInstance;
  private logger: Logger;

  constructor(
    private readonly url: string,
    options: ApiPermissionsStoreOptions = {}
  ) {
    this.client = options.client ?? axios.create();
    this.logger = options.logger ?? consoleLogger;
  }

  async load(): Promise<PermissionsSnapshot | undefined> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(this.url);
      data = response.data;
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        this.logger.warn(`No permissions found at ${this.url}`);
        return undefined;
      }
      throw error;
    }
    return validateSnapshot(data);
  }

  async save(snapshot: PermissionsSnapshot): Promise<void> {
    await this.client.put(this.url, snapshot);
  }
}
