import js from '@eslint/js';
import tseslint from 'typescript-eslint';
import prettier from 'eslint-config-prettier';

export default [
  js.configs.recommended,
  ...tseslint.configs.recommended,
  prettier,
  {
    rules: {
      '@typescript-eslint/no-explicit-any': 'error',
      '@typescript-eslint/no-unused-vars': [
        'error',
        {
          argsIgnorePattern: '^_',
          varsIgnorePattern: '^_',
        },
      ],
      'no-console': [
        'warn',
        {
          allow: ['warn', 'error'],
        },
      ],
    },
  },
  {
    ignores: ['dist', 'node_modules'],
  },
  // Output must depend only on the tree and resolved values
  {
    files: ['src/ssr/**/*.ts', 'src/runtime/**/*.ts', 'src/tree/**/*.ts'],
    rules: {
      'no-restricted-properties': [
        'error',
        {
          object: 'Math',
          property: 'random',
          message:
            'Avoid Math.random in the render pipeline: markup and payload must be reproducible.',
        },
        {
          object: 'Date',
          property: 'now',
          message:
            'Avoid Date.now in the render pipeline: use timers for deadlines instead of reading the clock.',
        },
      ],
    },
  },
  // The logger is the one place that talks to the console directly
  {
    files: ['src/dev/logger.ts'],
    rules: {
      'no-console': 'off',
    },
  },
];
