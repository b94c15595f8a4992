import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsPositive } from 'class-validator';
import { NetWorthSnapshot } from '../entities/net-worth-snapshot.entity';
import { toMoney } from '../../common/utils/decimal.util';

export class HistoryQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  limit?: number;
}

export interface NetWorthSnapshotDto {
  date: string;
  timestamp: string;
  accountBalance: number;
  portfolioValue: number;
  totalNetWorth: number;
}

export interface AccountBalanceDto {
  balance: number;
  lastUpdated: string;
}

export function toNetWorthSnapshotDto(snapshot: NetWorthSnapshot): NetWorthSnapshotDto {
  return {
    date: snapshot.date,
    timestamp: snapshot.timestamp.toISOString(),
    accountBalance: toMoney(snapshot.accountBalance),
    portfolioValue: toMoney(snapshot.portfolioValue),
    totalNetWorth: toMoney(snapshot.totalNetWorth),
  };
}
