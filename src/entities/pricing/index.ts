export * from "./PriceProvider";
export * from "./CoinGeckoPriceProvider";
