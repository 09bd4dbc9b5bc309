/**
 * Base prompt template for tariff-fact extraction.
 *
 * Jurisdictions append their own notes on code formats and rate wording.
 */

export function getExtractPromptBase(variables: {
  issuingCountry: string;
  codeFormat: string;
  notes?: string[];
}): string {
  const { issuingCountry, codeFormat, notes = [] } = variables;
  const extra = notes.length > 0 ? `\n## ${issuingCountry.toUpperCase()} NOTES\n${notes.map((n) => `- ${n}`).join("\n")}\n` : "";

  return `You are extracting trade-remedy duties from a ${issuingCountry} determination.

## OUTPUT
Return JSON only: {"hs_codes": [...], "items": [...]}.
Each item has: issuing_country, country, hs_code, tariff_type, tariff_rate,
effective_date_from, effective_date_to, investigation_period_from,
investigation_period_to, basis_law, company, case_number,
product_description, note. Use null for anything the text does not state.

## PRODUCT CODES
List every product code in "hs_codes" once. Format: ${codeFormat}.

## RATES
tariff_rate is a number without "%". Write "MIN_PRICE" for minimum-price schemes.
${extra}`;
}
