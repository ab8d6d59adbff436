import { test, expect } from '@playwright/test';
import { parseLegendRows } from '../src/scrape/legend';

test.describe('legend table', () => {
  test('reads code and bilingual names', () => {
    const legend = parseLegendRows([['CS101', 'Intro<br>เบื้องต้น']]);
    expect([...legend.values()]).toEqual([{ code: 'CS101', name_en: 'Intro', name_th: 'เบื้องต้น' }]);
  });

  test('skips short rows and rows without a code', () => {
    const legend = parseLegendRows([['CS101'], ['  ', 'Nameless<br>ไม่มีรหัส'], []]);
    expect(legend.size).toBe(0);
  });

  test('missing names default to empty strings', () => {
    const legend = parseLegendRows([
      ['MA201', 'Calculus'],
      ['PE100', '<br>&nbsp;'],
    ]);
    expect(legend.get('MA201')).toEqual({ code: 'MA201', name_en: 'Calculus', name_th: '' });
    expect(legend.get('PE100')).toEqual({ code: 'PE100', name_en: '', name_th: '' });
  });

  test('blank lines between names are ignored', () => {
    const legend = parseLegendRows([[' CS102 ', 'Programming<br><br> การเขียนโปรแกรม ']]);
    expect(legend.get('CS102')).toEqual({ code: 'CS102', name_en: 'Programming', name_th: 'การเขียนโปรแกรม' });
  });

  test('a repeated code keeps the last row', () => {
    const legend = parseLegendRows([
      ['CS101', 'Old<br>เก่า'],
      ['CS101', 'New<br>ใหม่'],
    ]);
    expect(legend.size).toBe(1);
    expect(legend.get('CS101')).toEqual({ code: 'CS101', name_en: 'New', name_th: 'ใหม่' });
  });
});
