/*
 * SPDX-License-Identifier: Apache-2.0
 */

import 'reflect-metadata';
import {type Contract} from 'fabric-contract-api';
import { QualityReportContract } from './contracts/QualityReportContract';
import { AccessControlContract } from './contracts/AccessControlContract';
import { PricingContract } from './contracts/PricingContract';
import { SensorDataContract } from './contracts/SensorDataContract';
import { LedgerEventsContract } from './contracts/LedgerEventsContract';

export { CropQualityLedger } from './ledger/CropQualityLedger';
export { MemoryWorldState } from './ledger/MemoryWorldState';
export * from './errors';

export const contracts: typeof Contract[] = [
    QualityReportContract,
    AccessControlContract,
    PricingContract,
    SensorDataContract,
    LedgerEventsContract
];
