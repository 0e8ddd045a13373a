import axios from "axios";
import { Injectable } from "@tsed/di";
import { BadGateway, GatewayTimeout, ServiceUnavailable } from "@tsed/exceptions";
import { $log } from "@tsed/logger";
import { OMDB_API_KEY, OMDB_API_URL, OMDB_TIMEOUT_MS } from "../config";
import { MovieInput } from "./MoviesService";

interface OmdbTitleResponse {
    Response: "True" | "False";
    Title?: string;
    Year?: string;
    imdbRating?: string;
    Poster?: string;
    Error?: string;
}

const TIMEOUT_CODES = ["ECONNABORTED", "ETIMEDOUT"];

@Injectable()
export class OmdbService {
    private readonly apiKey = OMDB_API_KEY;

    /**
     * Looks a title up on OMDb.
     *
     * @returns the movie's fields, or null when OMDb has no match
     * @throws GatewayTimeout, ServiceUnavailable or BadGateway when the API
     * cannot be reached or answers with an error status
     */
    async fetchMovie(title: string): Promise<MovieInput | null> {
        if (!this.apiKey) {
            throw new ServiceUnavailable("OMDB_API_KEY is required to fetch movie data.");
        }

        let data: OmdbTitleResponse;
        try {
            const res = await axios.get<OmdbTitleResponse>(OMDB_API_URL, {
                params: { apikey: this.apiKey, t: title },
                timeout: OMDB_TIMEOUT_MS,
            });
            data = res.data;
        } catch (err) {
            throw this.toServiceError(err);
        }

        if (!data || data.Response !== "True" || !data.Title) {
            return null;
        }

        const year = this.parseYear(data.Year);
        if (year === null) {
            $log.warn(`OMDb returned an unusable year for "${data.Title}": ${data.Year}`);
            return null;
        }

        return {
            title: data.Title,
            year,
            rating: this.parseRating(data.imdbRating),
            posterUrl: data.Poster && data.Poster !== "N/A" ? data.Poster : null,
        };
    }

    // "2010", or "2010–2014" for series
    parseYear(value: string | undefined): number | null {
        const match = /^\d{4}/.exec(value ?? "");
        return match ? parseInt(match[0], 10) : null;
    }

    parseRating(value: string | undefined): number {
        const rating = Number(value);
        return value && value !== "N/A" && Number.isFinite(rating) ? rating : 0;
    }

    private toServiceError(err: unknown): Error {
        if (!axios.isAxiosError(err)) {
            return err instanceof Error ? err : new Error(String(err));
        }

        $log.warn(`OMDb request failed: ${err.message}`);
        if (err.response) {
            return new BadGateway(`OMDb API responded with status ${err.response.status}`);
        }
        if (err.code && TIMEOUT_CODES.includes(err.code)) {
            return new GatewayTimeout(`OMDb API did not respond within ${OMDB_TIMEOUT_MS} ms`);
        }
        return new ServiceUnavailable("Could not connect to OMDb API. Please check your internet connection.");
    }
}
