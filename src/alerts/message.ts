import type { AlertMessage } from "../notify/mailer.js";
import type { FilingData } from "../types.js";

export type AlertContext = {
  title: string;
  updatedAt: string;
  indexUrl: string;
  xmlUrl: string;
  requiredCode: string;
};

const usd = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  maximumFractionDigits: 2
});

const shares = new Intl.NumberFormat("en-US", { maximumFractionDigits: 4 });

export function formatUsd(value: number) {
  return usd.format(value);
}

export function buildAlertMessage(filing: FilingData, context: AlertContext): AlertMessage {
  const ticker = filing.ticker || "UNKNOWN";
  const code = context.requiredCode.toUpperCase();
  const subject = `Form 4 ${code} ${ticker} ${formatUsd(filing.totalValueUsd)}`;

  const lines = [
    context.title,
    `Updated: ${context.updatedAt}`,
    "",
    ...filing.transactions.map(
      (tx) =>
        `${tx.transactionDate || "n/a"} ${tx.code || "?"} ${shares.format(tx.shares)} @ ${formatUsd(
          tx.pricePerShare
        )} = ${formatUsd(tx.value)}`
    ),
    "",
    `Total: ${formatUsd(filing.totalValueUsd)}`,
    `Index: ${context.indexUrl}`,
    `Document: ${context.xmlUrl}`
  ];

  return { subject, text: lines.join("\n") };
}
