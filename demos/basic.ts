import {DATA, Directive, Policy, UNSAFE_INLINE} from '../src'

const policy = Policy.starter({
  upgradeInsecureRequests: true,
  reportUri: '/_csp-report',
})

policy
  .directive('script-src', 'cdnjs.cloudflare.com', 'cdn.jsdelivr.net')
  .allow('nonce')
  .hash(512, 'doSomething()')
  .add('www.google-analytics.com', UNSAFE_INLINE, DATA)
policy.directive('img-src').allowAll()
policy.directive('require-trusted-types-for', "'script'")

console.log('Template:', policy.build())

const {header, nonce} = policy.withNonce()
console.log('Nonce:', nonce)
console.log('Content-Security-Policy:', header)

const perRequest = policy.mergeBuild({
  'script-src': new Directive().hash(256, 'renderedAt(Date.now())'),
})
console.log('Merged template:', perRequest)
