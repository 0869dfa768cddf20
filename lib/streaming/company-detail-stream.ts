import { COMPANY_DETAIL_CONFIG } from '../config';
import type { CompanyDetailOrchestrator } from '../agent-architecture/orchestrator';
import type { CompanyDetailStreamEvent, CompanyRow, RowCompanyDetailResult } from '../types';

export interface CompanyDetailStreamOptions {
  rows: CompanyRow[];
  sessionId: string;
  orchestrator: Pick<CompanyDetailOrchestrator, 'run'>;
  signal: AbortSignal;
  delayBetweenRowsMs?: number;
  /** Called once the stream has closed, whatever the outcome */
  onClose?: () => Promise<void> | void;
}

const encoder = new TextEncoder();

export function encodeEvent(event: CompanyDetailStreamEvent): Uint8Array {
  return encoder.encode(`data: ${JSON.stringify(event)}\n\n`);
}

/**
 * Processes rows one at a time and emits server-sent events. A row that
 * fails becomes an error result; the remaining rows still run.
 */
export function createCompanyDetailStream(options: CompanyDetailStreamOptions): ReadableStream<Uint8Array> {
  const { rows, sessionId, orchestrator, signal } = options;
  const delayBetweenRowsMs = options.delayBetweenRowsMs ?? COMPANY_DETAIL_CONFIG.PROCESSING.DELAY_BETWEEN_ROWS_MS;

  return new ReadableStream<Uint8Array>({
    async start(controller) {
      const send = (event: CompanyDetailStreamEvent) => controller.enqueue(encodeEvent(event));

      try {
        send({ type: 'session', sessionId });

        for (let i = 0; i < rows.length; i++) {
          if (signal.aborted) {
            send({ type: 'cancelled' });
            break;
          }

          const row = rows[i];
          send({ type: 'processing', rowIndex: i, totalRows: rows.length });

          let result: RowCompanyDetailResult;
          try {
            console.log(`[COMPANY-DETAIL] Processing row ${i + 1}/${rows.length} - ${row.company_name} (${row.company_url})`);
            const startTime = Date.now();

            const output = await orchestrator.run(row.company_name, row.company_url, {
              spanContext: {
                traceInit: {
                  name: 'company_detail_api',
                  sessionId,
                  metadata: { company_name: row.company_name, company_url: row.company_url },
                },
              },
              onAgentProgress: (message, messageType) => {
                send({ type: 'agent_progress', rowIndex: i, message, messageType });
              },
            });

            console.log(`[COMPANY-DETAIL] Completed row ${i + 1} in ${Date.now() - startTime}ms`);
            result = { rowIndex: i, originalData: row, output, status: 'completed' };
          } catch (error) {
            result = {
              rowIndex: i,
              originalData: row,
              status: 'error',
              error: error instanceof Error ? error.message : 'Unknown error',
            };
          }
          send({ type: 'result', result });

          // Small delay between rows to prevent rate limiting
          if (i < rows.length - 1 && delayBetweenRowsMs > 0) {
            await new Promise(resolve => setTimeout(resolve, delayBetweenRowsMs));
          }
        }

        send({ type: 'complete' });
      } catch (error) {
        send({ type: 'error', error: error instanceof Error ? error.message : 'Unknown error' });
      } finally {
        controller.close();
        try {
          await options.onClose?.();
        } catch (error) {
          console.error('[COMPANY-DETAIL] Session cleanup failed:', error instanceof Error ? error.message : error);
        }
      }
    },
  });
}
