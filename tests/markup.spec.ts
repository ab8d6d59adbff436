import { test, expect } from '@playwright/test';
import { cellLines, cellText } from '../src/scrape/markup';

test.describe('cell markup', () => {
  test('splits on <br> in any spelling', () => {
    expect(cellLines('CS101<br>G1<BR>S-101<br/>(09:00-12:00)')).toEqual(['CS101', 'G1', 'S-101', '(09:00-12:00)']);
  });

  test('drops tags but keeps their text', () => {
    expect(cellLines('<font color="red">CS101</font><br><b>G1</b>')).toEqual(['CS101', 'G1']);
  });

  test('void and unclosed elements do not break the cell', () => {
    expect(cellLines('CS<img src="x.png">101')).toEqual(['CS101']);
    expect(cellLines('<font>CS101<br>G1')).toEqual(['CS101', 'G1']);
    expect(cellLines('<b>S-101<br>(09:00-12:00)</font>')).toEqual(['S-101', '(09:00-12:00)']);
  });

  test('block elements and raw newlines end a line', () => {
    expect(cellLines('<div>Intro</div><div>เบื้องต้น</div>')).toEqual(['Intro', 'เบื้องต้น']);
    expect(cellLines('Line one\nLine two')).toEqual(['Line one', 'Line two']);
  });

  test('decodes entities and treats &nbsp; as blank', () => {
    expect(cellText('Data &amp; Networks')).toBe('Data & Networks');
    expect(cellLines('&nbsp;')).toEqual([]);
  });

  test('cellText joins lines with a space', () => {
    expect(cellText('  จันทร์  ')).toBe('จันทร์');
    expect(cellText('Intro<br>Part 2')).toBe('Intro Part 2');
  });
});
