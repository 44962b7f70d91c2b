import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { Coordinates, isValidCoordinates } from '@libs/common';

const GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json';
const REQUEST_TIMEOUT_MS = 10000;
const CACHE_SIZE = 100;

interface GeocodeApiResult {
  geometry?: { location?: { lat?: unknown; lng?: unknown } };
}

interface GeocodeApiResponse {
  status?: string;
  results?: GeocodeApiResult[];
  error_message?: string;
}

/**
 * Place name → coordinates through the Google Geocoding API.
 * Never throws: every failure resolves to null.
 */
@Injectable()
export class GeocodingService {
  private readonly logger = new Logger(GeocodingService.name);

  // Map keeps insertion order; re-inserting on hit makes it an LRU
  private readonly cache = new Map<string, Coordinates | null>();

  public constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {}

  public async geocode(placeName: string): Promise<Coordinates | null> {
    const query = placeName.trim();
    if (!query) {
      return null;
    }

    const cacheKey = query.toLowerCase();
    if (this.cache.has(cacheKey)) {
      const cached = this.cache.get(cacheKey) ?? null;
      this.remember(cacheKey, cached);
      return cached;
    }

    const apiKey = this.configService.get<string>('GOOGLE_MAPS_API_KEY');
    if (!apiKey) {
      this.logger.warn('GOOGLE_MAPS_API_KEY is not set, geocoding disabled');
      return null;
    }

    let data: GeocodeApiResponse;
    try {
      const response = await firstValueFrom(
        this.httpService.get<GeocodeApiResponse>(GEOCODE_URL, {
          params: {
            address: query,
            key: apiKey,
            region: this.configService.get<string>('GEOCODING_REGION', 'th'),
            language: this.configService.get<string>('GEOCODING_LANGUAGE', 'th'),
          },
          timeout: REQUEST_TIMEOUT_MS,
        }),
      );
      data = response.data;
    } catch (error) {
      this.logger.warn(`Geocoding request failed for "${query}": ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    if (data.status === 'ZERO_RESULTS') {
      this.logger.warn(`No geocoding result for "${query}"`);
      this.remember(cacheKey, null);
      return null;
    }

    if (data.status !== 'OK') {
      this.logger.warn(`Geocoding failed for "${query}": ${data.status ?? 'no status'} ${data.error_message ?? ''}`.trim());
      return null;
    }

    const coords = this.extractCoordinates(data.results?.[0]);
    if (!coords) {
      this.logger.warn(`Geocoding result for "${query}" has no usable location`);
    }

    this.remember(cacheKey, coords);
    return coords;
  }

  private extractCoordinates(result: GeocodeApiResult | undefined): Coordinates | null {
    const location = result?.geometry?.location;
    if (typeof location?.lat !== 'number' || typeof location.lng !== 'number') {
      return null;
    }

    const coords = { latitude: location.lat, longitude: location.lng };

    return isValidCoordinates(coords) ? coords : null;
  }

  private remember(key: string, value: Coordinates | null): void {
    this.cache.delete(key);
    this.cache.set(key, value);

    if (this.cache.size > CACHE_SIZE) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
  }
}
