import axios, { AxiosInstance } from 'axios';
import { OpenFdaConfig } from '../config';
import { errorMessage } from '../errors/http.errors';
import { openFdaLabelSchema, openFdaSearchSchema } from '../schemas/openfda.schema';
import { Medication, ServiceResponse } from '../types/RecommendationTypes';
import { firstSentence } from '../utils/text';

/** Looks up FDA drug labels whose indications match a free-text condition. */
export class OpenFdaService {
  constructor(
    private readonly config: OpenFdaConfig,
    private readonly http: AxiosInstance = axios.create()
  ) {}

  async findMedications(
    condition: string,
    signal?: AbortSignal
  ): Promise<ServiceResponse<Medication[]>> {
    const phrase = condition.replace(/"/g, '').trim();
    if (!phrase) {
      return { success: true, data: [] };
    }

    try {
      const response = await this.http.get<unknown>(this.config.url, {
        params: this.buildParams(phrase),
        timeout: this.config.timeoutMs,
        signal,
        validateStatus: () => true,
      });

      // openFDA answers 404 when the search matched nothing.
      if (response.status === 404) {
        return { success: true, data: [] };
      }
      if (response.status !== 200) {
        return this.degraded(`openFDA returned status ${response.status}`);
      }

      const body = openFdaSearchSchema.safeParse(response.data);
      if (!body.success) {
        return this.degraded('openFDA response has no results array');
      }

      return { success: true, data: this.toMedications(body.data.results) };
    } catch (error) {
      return this.degraded(`openFDA request failed: ${errorMessage(error)}`);
    }
  }

  private buildParams(phrase: string): Record<string, string | number> {
    const params: Record<string, string | number> = {
      search: `indications_and_usage:"${phrase}"`,
      limit: this.config.limit,
    };
    if (this.config.apiKey) {
      params.api_key = this.config.apiKey;
    }
    return params;
  }

  private toMedications(results: unknown[]): Medication[] {
    const medications: Medication[] = [];
    let skipped = 0;

    for (const result of results) {
      const label = openFdaLabelSchema.safeParse(result);
      if (!label.success) {
        skipped += 1;
        continue;
      }
      medications.push({
        name: label.data.openfda.brand_name[0].trim(),
        dosage: firstSentence(label.data.dosage_and_administration[0]),
        purpose: firstSentence(label.data.indications_and_usage[0]),
      });
    }

    if (skipped > 0) {
      console.warn(`Skipped ${skipped} openFDA label(s) missing name, dosage or purpose`);
    }
    return medications;
  }

  private degraded(error: string): ServiceResponse<Medication[]> {
    console.error(error);
    return { success: false, data: [], error };
  }
}
