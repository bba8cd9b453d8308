/**
 * Golden Test Fixtures
 * Documents with the findings the default issuer table should produce
 */

export interface ExpectedFinding {
  lineNumber: number;
  issuer: string;
  maskedNumber: string;
}

export interface GoldenTestCase {
  name: string;
  input: string;
  expected: ExpectedFinding[];
  description?: string;
}

/**
 * Documents containing card numbers
 */
export const GOLDEN_TESTS: GoldenTestCase[] = [
  {
    name: 'csv-export',
    input: 'id,name,card\n1,Test User,4111111111111111\n2,Other User,5500-0000-0000-0004\n',
    expected: [
      { lineNumber: 2, issuer: 'visa', maskedNumber: '411111******1111' },
      { lineNumber: 3, issuer: 'mastercard', maskedNumber: '550000******0004' },
    ],
    description: 'Customer card export',
  },
  {
    name: 'log-line',
    input: '2024-05-01T10:00:00Z INFO payment {"pan":"378282246310005","amount":12.5}\n',
    expected: [{ lineNumber: 1, issuer: 'amex', maskedNumber: '378282*****0005' }],
    description: 'Application log with a card in a JSON payload',
  },
  {
    name: 'spaced-groups',
    input: 'Card: 6011 1111 1111 1117 exp 12/29\n',
    expected: [{ lineNumber: 1, issuer: 'discover', maskedNumber: '601111******1117' }],
    description: 'Grouped digits as printed on a card',
  },
  {
    name: 'jcb',
    input: 'JCB 3530111333300000\n',
    expected: [{ lineNumber: 1, issuer: 'jcb', maskedNumber: '353011******0000' }],
  },
  {
    name: 'diners-14',
    input: 'Diners 3056 930902 5904\n',
    expected: [{ lineNumber: 1, issuer: 'diners', maskedNumber: '305693****5904' }],
    description: '14-digit Diners Club in 4-6-4 grouping',
  },
  {
    name: 'unionpay-19',
    input: 'UP 6212 3456 7890 1234 569\n',
    expected: [{ lineNumber: 1, issuer: 'unionpay', maskedNumber: '621234*********4569' }],
    description: '19-digit UnionPay',
  },
  {
    name: 'mir',
    input: 'mir=2200000000000004;\n',
    expected: [{ lineNumber: 1, issuer: 'mir', maskedNumber: '220000******0004' }],
  },
  {
    name: 'troy',
    input: 'troy 9792000000000003\n',
    expected: [{ lineNumber: 1, issuer: 'troy', maskedNumber: '979200******0003' }],
  },
  {
    name: 'elo-over-visa',
    input: 'elo 4011780000000006\n',
    expected: [{ lineNumber: 1, issuer: 'elo', maskedNumber: '401178******0006' }],
    description: 'Elo BIN inside the Visa range',
  },
  {
    name: 'rupay-over-maestro',
    input: 'rupay 5085000000000007\n',
    expected: [{ lineNumber: 1, issuer: 'rupay', maskedNumber: '508500******0007' }],
    description: 'RuPay BIN inside Maestro space',
  },
  {
    name: 'discover-over-unionpay',
    input: 'cup 6221260000000000\n',
    expected: [{ lineNumber: 1, issuer: 'discover', maskedNumber: '622126******0000' }],
    description: 'Discover co-branded range inside UnionPay space',
  },
  {
    name: 'multi-line',
    input: 'a 4111111111111111\n\n\nb 4532015112830366 c 5105105105105100\n',
    expected: [
      { lineNumber: 1, issuer: 'visa', maskedNumber: '411111******1111' },
      { lineNumber: 4, issuer: 'visa', maskedNumber: '453201******0366' },
      { lineNumber: 4, issuer: 'mastercard', maskedNumber: '510510******5100' },
    ],
    description: 'Several cards across lines',
  },
];

/**
 * Documents that must produce no findings
 */
export const ADVERSARIAL_TESTS: GoldenTestCase[] = [
  { name: 'luhn-invalid', input: 'Card 4532015112830367\n', expected: [], description: 'One digit off a valid number' },
  { name: 'unknown-bin', input: 'ref 9999999999999995\n', expected: [], description: 'Luhn-valid but no issuer' },
  { name: 'timestamp', input: 'ts=1714557600000 next=1714557600123\n', expected: [], description: 'Epoch milliseconds' },
  { name: 'phone-numbers', input: 'Call +1 555 123 4567 or +49 30 12345678\n', expected: [], description: 'Phone numbers' },
  { name: 'embedded', input: 'id=x4111111111111111y\n', expected: [], description: 'Digits glued to letters' },
  { name: 'too-short', input: 'acct 411111111111\n', expected: [], description: '12-digit number' },
  { name: 'double-separators', input: '4111  1111  1111  1111\n', expected: [], description: 'Groups split by two spaces' },
  { name: 'iban', input: 'DE89 3704 0044 0532 0130 00\n', expected: [], description: 'IBAN with a card-like run' },
  { name: 'amex-wrong-length', input: '3782822463100050\n', expected: [], description: 'Amex BIN with 16 digits' },
];
