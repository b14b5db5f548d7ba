import { ParseError } from "../lib/errors.js";
import { child, parseXml, textValue, toArray } from "../lib/xml.js";
import type { FilingData, Transaction } from "../types.js";

const DECIMAL_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

/** Anything but a plain non-negative decimal (hex, exponents, separators, signs) → 0. Never throws. */
export function parseAmount(raw: string | null): number {
  if (!raw) return 0;
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return 0;
  const value = Number(trimmed);
  if (!Number.isFinite(value) || value < 0) return 0;
  return value;
}

function parseTransaction(node: unknown): Transaction {
  const shares = parseAmount(textValue(child(node, "transactionAmounts", "transactionShares", "value")));
  const pricePerShare = parseAmount(
    textValue(child(node, "transactionAmounts", "transactionPricePerShare", "value"))
  );
  return {
    transactionDate: textValue(child(node, "transactionDate", "value")) ?? "",
    code: textValue(child(node, "transactionCoding", "transactionCode")) ?? "",
    shares,
    pricePerShare,
    value: shares * pricePerShare
  };
}

export function parseForm4(xml: string): FilingData {
  const parsed = parseXml(xml);
  const document = parsed.ownershipDocument;
  if (document === undefined) {
    throw new ParseError("Missing ownershipDocument root");
  }

  const ticker = (textValue(child(document, "issuer", "issuerTradingSymbol")) ?? "").toUpperCase();
  const transactions = toArray(child(document, "nonDerivativeTable", "nonDerivativeTransaction")).map(
    parseTransaction
  );
  const totalValueUsd = transactions.reduce((sum, tx) => sum + tx.value, 0);

  return { ticker, transactions, totalValueUsd };
}
