import type { Bar } from '../types.js';

/**
 * 가격 이력 공급자 인터페이스
 *
 * 구현체는 날짜 오름차순, 중복 없는 Bar 시퀀스를 반환해야 한다.
 * 재시도/속도 제한/캐시는 구현체의 책임이다.
 */
export interface BarSource {
  readonly name: string;
  fetchBars(code: string, startDate: string, endDate: string): Promise<Bar[]>;
  healthCheck(): Promise<boolean>;
}

/**
 * 메모리에 올려둔 Bar로 동작하는 공급자
 */
export class InMemoryBarSource implements BarSource {
  readonly name = 'in-memory';
  private readonly barsByCode: Map<string, readonly Bar[]>;

  constructor(barsByCode: Readonly<Record<string, readonly Bar[]>>) {
    this.barsByCode = new Map(Object.entries(barsByCode));
  }

  async fetchBars(code: string, startDate: string, endDate: string): Promise<Bar[]> {
    const bars = this.barsByCode.get(code) ?? [];
    return bars.filter((bar) => bar.date >= startDate && bar.date <= endDate);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  codes(): string[] {
    return [...this.barsByCode.keys()];
  }
}
