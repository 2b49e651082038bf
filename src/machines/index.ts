export * from "./users";
export * from "./switches";
export * from "./atm";
export * from "./accountedCurrency";
export * from "./digitalCash";
export * from "./sumProduct";
