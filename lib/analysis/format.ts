const moneyFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const wholeMoneyFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/** 1234.5 -> "1,234.50" */
export function formatMoney(amount: number): string {
  return moneyFormat.format(amount);
}

/** 7500 -> "7,500" */
export function formatWholeMoney(amount: number): string {
  return wholeMoneyFormat.format(amount);
}
