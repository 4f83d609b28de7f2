import antfu from '@antfu/eslint-config'

export default antfu({
  node: true,
  ignores: ['node_modules', 'dist', '*.md'],
  rules: {
    'no-console': 'off',
  },
})
