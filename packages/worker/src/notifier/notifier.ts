import axios, { AxiosInstance } from 'axios';
import { EvaluationPayload } from '@pagelaunch/shared';
import { NotificationError } from '../errors';

export interface CompletionNotifier {
  notify(evaluationUrl: string, payload: EvaluationPayload): Promise<void>;
}

/**
 * Posts the completion payload to the evaluation server. One attempt only.
 */
export class EvaluationNotifier implements CompletionNotifier {
  constructor(private http: AxiosInstance = axios.create()) {}

  async notify(evaluationUrl: string, payload: EvaluationPayload): Promise<void> {
    console.log(`[Notifier] Sending payload to ${evaluationUrl}`);
    try {
      const response = await this.http.post(evaluationUrl, payload, {
        headers: { 'Content-Type': 'application/json' },
      });
      console.log(`[Notifier] Successfully notified evaluation server. Status: ${response.status}`);
    } catch (error) {
      const message = axios.isAxiosError(error)
        ? error.response
          ? `evaluation server responded with ${error.response.status}`
          : error.message
        : String(error);
      console.error(`[Notifier] Error notifying evaluation server: ${message}`);
      throw new NotificationError(`Failed to notify evaluation server: ${message}`, { cause: error });
    }
  }
}
