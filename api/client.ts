import axios, { AxiosError, AxiosInstance } from 'axios';
import { MinerStatusDocument } from '../common/types';
import { CONF_PATH, STATUS_PATH } from './app';

export interface ClientResponse<T> {
  success: boolean;
  status: number;
  data?: T;
  error?: string;
}

export interface ConfResponse {
  success: boolean;
  message: string;
  details?: { path: string; message: string }[];
}

/**
 * Speaks the device's CGI dialect. Used for the startup self-check and by
 * anything that wants to poll an emulated unit the way pool software would.
 */
export class TelemetryClient {
  private client: AxiosInstance;

  constructor(baseUrl: string, timeoutMs: number = 5000) {
    this.client = axios.create({
      baseURL: baseUrl,
      timeout: timeoutMs,
      headers: { 'Content-Type': 'application/json' }
    });
  }

  async getMinerStatus(): Promise<ClientResponse<MinerStatusDocument>> {
    try {
      const response = await this.client.get<MinerStatusDocument>(STATUS_PATH);
      return { success: true, status: response.status, data: response.data };
    } catch (error) {
      return this.handleError(error);
    }
  }

  async setMinerConf(body: Record<string, unknown>): Promise<ClientResponse<ConfResponse>> {
    try {
      const response = await this.client.post<ConfResponse>(CONF_PATH, body);
      return { success: true, status: response.status, data: response.data };
    } catch (error) {
      return this.handleError(error);
    }
  }

  private handleError<T>(error: unknown): ClientResponse<T> {
    if (error instanceof AxiosError) {
      return {
        success: false,
        status: error.response?.status ?? 0,
        error: error.message
      };
    }
    return { success: false, status: 0, error: String(error) };
  }
}
