import express from 'express'
import {Policy, contentSecurityPolicy, cspHashInline, cspNonce} from '../src'

const policy = Policy.starter({reportUri: '/_csp-report'})
policy.directive('script-src').allow('self', 'nonce', 'strict-dynamic')

const app = express()
app.use(contentSecurityPolicy(policy))

app.get('/', (_req, res) => {
  const nonce = cspNonce(res)
  const html =
    '<!doctype html><html><head><style>body{font-family:sans-serif}</style></head>' +
    `<body><script nonce="${nonce}">document.body.append('hello')</script></body></html>`

  // the inline <style> is allowed by hash, the script by nonce
  cspHashInline(res, html)
  res.type('html').send(html)
})

app.listen(3000, () => {
  console.log('Listening on http://localhost:3000')
})
