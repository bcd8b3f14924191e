import { ValueTransformer } from 'typeorm';
import { Money } from './money';

// decimal columns come back as strings from postgres and as numbers from sqlite
export const moneyTransformer: ValueTransformer = {
  to: (value: Money | null | undefined): string | null | undefined =>
    value instanceof Money ? value.toFixed() : value,
  from: (value: string | number | null): Money | null =>
    value === null ? null : Money.of(value),
};
