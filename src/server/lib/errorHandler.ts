/**
 * Centralized error handling for the Express routes
 */
import type { Response } from "express";
import { env } from "../../../shared/config/env.js";
import { AnalysisError, ValidationError, errorMessage } from "../../errors.js";
import { logError, logWarn } from "../../utils/logger.js";

function httpStatusOf(error: unknown): number {
    if (error instanceof AnalysisError) return error.statusCode;
    // body-parser errors carry their own 4xx status
    if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
        return error.status >= 400 && error.status < 500 ? error.status : 500;
    }
    return 500;
}

export function handleError(res: Response, error: unknown, defaultMessage = "Internal server error"): void {
    const statusCode = httpStatusOf(error);
    const message = errorMessage(error) || defaultMessage;

    if (statusCode >= 500) {
        logError(`API Error (${statusCode})`, error);
    } else {
        logWarn(`API ${statusCode}: ${message}`);
    }

    res.status(statusCode).json({
        error: statusCode >= 500 ? defaultMessage : message,
        code: error instanceof AnalysisError ? error.code : undefined,
        ...(error instanceof ValidationError && { issues: error.issues }),
        ...(statusCode >= 500 && env.NODE_ENV() !== "production" && { message }),
    });
}
