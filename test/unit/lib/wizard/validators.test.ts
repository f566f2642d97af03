import {
  checkLinodeToken,
  validateClusterName,
  validateEmail,
  validateNodeCount,
  validateRequired,
} from '@/lib/wizard/validators';

jest.mock('@/lib/prompts', () => ({
  logInfo: jest.fn(),
  logWarning: jest.fn(),
}));

describe('Wizard validators', () => {
  describe('validateClusterName', () => {
    it.each(['worker-1', 'us2', 'a-b-c'])('should accept %s', (name) => {
      expect(validateClusterName(name)).toBeUndefined();
    });

    it.each([
      [undefined, 'Cluster name must be at least 2 characters'],
      ['a', 'Cluster name must be at least 2 characters'],
      ['x'.repeat(41), 'Cluster name must be at most 40 characters'],
      ['-worker', 'Cannot start or end with hyphen'],
      ['worker-', 'Cannot start or end with hyphen'],
      ['Worker', 'Use lowercase letters, numbers, and hyphens only'],
      ['work_er', 'Use lowercase letters, numbers, and hyphens only'],
      ['work--er', 'Cannot contain consecutive hyphens'],
      ['controller', "'controller' is reserved for the controller cluster"],
    ])('should reject %s', (name, message) => {
      expect(validateClusterName(name)).toBe(message);
    });
  });

  describe('validateNodeCount', () => {
    it('should accept counts between 1 and 100', () => {
      expect(validateNodeCount('1')).toBeUndefined();
      expect(validateNodeCount(' 100 ')).toBeUndefined();
    });

    it('should reject non-numeric and out-of-range counts', () => {
      expect(validateNodeCount('three')).toBe('Enter a whole number');
      expect(validateNodeCount('1.5')).toBe('Enter a whole number');
      expect(validateNodeCount('0')).toBe('At least one node is required');
      expect(validateNodeCount('101')).toBe('LKE node pools are limited to 100 nodes');
    });
  });

  describe('validateEmail', () => {
    it('should accept an address and reject anything else', () => {
      expect(validateEmail('demo@example.com')).toBeUndefined();
      expect(validateEmail('demo@example')).toBe('Enter a valid email address');
      expect(validateEmail('')).toBe('Enter a valid email address');
    });
  });

  describe('validateRequired', () => {
    it('should reject blank values', () => {
      expect(validateRequired('  ')).toBe('Value is required');
      expect(validateRequired('x')).toBeUndefined();
    });
  });

  describe('checkLinodeToken', () => {
    it('should detect the token in the environment', () => {
      expect(checkLinodeToken({ LINODE_TOKEN: 'test-secret' })).toBe(true);
      expect(checkLinodeToken({})).toBe(false);
    });
  });
});
