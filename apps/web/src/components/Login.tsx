import React, { useState } from 'react';
import { login } from '../api.js';

export default function Login({ onAuthed }: { onAuthed: (token: string) => void }) {
  const [password, setPassword] = useState('');
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);

  const onSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    setLoading(true);
    setError(null);
    try {
      onAuthed(await login(password));
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Login failed');
    } finally {
      setLoading(false);
    }
  };

  return (
    <div style={{ maxWidth: 360, margin: '15vh auto', fontFamily: 'sans-serif' }}>
      <h1 style={{ fontSize: 22 }}>Commuting time dashboard</h1>
      <form onSubmit={(e) => void onSubmit(e)}>
        <input
          type="password"
          placeholder="Password"
          autoFocus
          value={password}
          onChange={(e) => setPassword(e.target.value)}
          style={{ width: '100%', padding: 8, boxSizing: 'border-box' }}
        />
        {error && <div style={{ color: '#b00020', marginTop: 8 }}>{error}</div>}
        <button type="submit" disabled={loading} style={{ marginTop: 12, width: '100%', padding: 8 }}>
          {loading ? 'Signing in…' : 'Sign in'}
        </button>
      </form>
    </div>
  );
}
