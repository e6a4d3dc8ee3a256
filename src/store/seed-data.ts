import type { TableSeed } from "../types";

/**
 * Default floor: four 2-seaters, four 4-seaters and two 6-seaters
 */
export const seedTables: TableSeed[] = [
    { number: "T1", capacity: 2 },
    { number: "T2", capacity: 2 },
    { number: "T3", capacity: 2 },
    { number: "T4", capacity: 2 },
    { number: "T5", capacity: 4 },
    { number: "T6", capacity: 4 },
    { number: "T7", capacity: 4 },
    { number: "T8", capacity: 4 },
    { number: "T9", capacity: 6 },
    { number: "T10", capacity: 6 }
];
