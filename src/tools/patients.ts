/**
 * Patient Cohort MCP Tools
 *
 * Tools: medkg_patient_query, medkg_patient_columns
 *
 * Read-only access to the aneurysm-level cohort table. Nothing here touches
 * the knowledge graph.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/patients
 */

import { requirePatientEngine } from '../server/state.js';
import { successResult } from '../server/types.js';
import { PatientColumnsInput, PatientQueryInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * Handle medkg_patient_query
 */
async function handlePatientQuery(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PatientQueryInput, params);
    const result = requirePatientEngine().query(input);
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_patient_columns
 */
async function handlePatientColumns(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(PatientColumnsInput, params);
    return formatResponse(successResult(requirePatientEngine().describe()));
  } catch (error) {
    return handleError(error);
  }
}

export const patientTools: Record<string, ToolDefinition> = {
  medkg_patient_query: {
    description:
      'Query patient or aneurysm-level cohort data: direct case/aneurysm lookup, AND-ed filters (== != < > <= >= in contains between) and column or group selection',
    inputSchema: PatientQueryInput.shape,
    handler: handlePatientQuery,
  },
  medkg_patient_columns: {
    description: 'List the cohort table columns with their types and units, and the column groups usable in select',
    inputSchema: PatientColumnsInput.shape,
    handler: handlePatientColumns,
  },
};
