/**
 * @fileoverview OpenTelemetry Bootstrap
 *
 * Must be imported before anything else in main.ts so the HTTP
 * instrumentation is in place before Nest and googleapis load.
 *
 * @remarks
 * Tracing stays off unless OTEL_EXPORTER_OTLP_ENDPOINT is set; most
 * deployments of the portal have no collector. OTEL_SAMPLE_RATIO overrides
 * the default ratio (10% in production, everything elsewhere).
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { ParentBasedSampler, TraceIdRatioBasedSampler } from '@opentelemetry/sdk-trace-node';

function sampleRatio(): number {
    const configured = Number(process.env.OTEL_SAMPLE_RATIO);
    if (Number.isFinite(configured) && configured >= 0 && configured <= 1) return configured;
    return process.env.NODE_ENV === 'production' ? 0.1 : 1;
}

/**
 * Starts the SDK and flushes pending spans on SIGTERM. Exiting is left to
 * Nest's shutdown hooks.
 */
export function startTracing(endpoint: string): NodeSDK {
    const sdk = new NodeSDK({
        resource: new Resource({
            [SemanticResourceAttributes.SERVICE_NAME]: 'member-leave-portal',
            [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: process.env.NODE_ENV || 'development',
        }),
        traceExporter: new OTLPTraceExporter({ url: `${endpoint.replace(/\/+$/, '')}/v1/traces` }),
        sampler: new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(sampleRatio()) }),
        instrumentations: [
            getNodeAutoInstrumentations({
                '@opentelemetry/instrumentation-fs': { enabled: false },
                '@opentelemetry/instrumentation-dns': { enabled: false },
                '@opentelemetry/instrumentation-net': { enabled: false },
            }),
        ],
    });

    sdk.start();

    process.once('SIGTERM', () => {
        sdk.shutdown().catch((error: Error) => console.error('Error flushing traces', error));
    });

    return sdk;
}

const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
if (endpoint) {
    startTracing(endpoint);
}
