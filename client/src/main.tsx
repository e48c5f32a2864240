import React from 'react'
import ReactDOM from 'react-dom/client'
import ClaimsExplorer from './pages/ClaimsExplorer'
import './index.css'

const rootElement = document.getElementById('root')
if (!rootElement) {
  throw new Error('Root element #root not found')
}

ReactDOM.createRoot(rootElement).render(
  <React.StrictMode>
    <ClaimsExplorer />
  </React.StrictMode>
)
